import type { CellValue, CurriculumReferenceEntry, RetrievalResult, Table } from '../types';
import { APP_PREFIX, MAX_CONTEXT_BULLETS } from '../constants';

function findColumn(columns: string[], name: string): string | undefined {
  return columns.find(column => column.trim().toLowerCase() === name);
}

function cellText(value: CellValue | undefined): string | null {
  if (value === null || value === undefined) return null;
  const text = String(value).trim();
  return text === '' ? null : text;
}

/**
 * Lifts loosely keyed reference rows into typed entries. Every column other
 * than grade and skill is kept, in column order, as a descriptive detail.
 * Returns null when the table lacks a grade or skill column.
 */
export function toReferenceEntries(table: Table): CurriculumReferenceEntry[] | null {
  const gradeColumn = findColumn(table.columns, 'grade');
  const skillColumn = findColumn(table.columns, 'skill');
  if (!gradeColumn || !skillColumn) return null;

  const detailColumns = table.columns.filter(column => column !== gradeColumn && column !== skillColumn);

  return table.rows.map(row => ({
    grade: cellText(row[gradeColumn]) ?? '',
    skill: cellText(row[skillColumn]) ?? '',
    details: detailColumns.map((column): [string, string | null] => [column, cellText(row[column])])
  }));
}

export function formatReferenceBullet(entry: CurriculumReferenceEntry): string {
  const fields = entry.details
    .filter(([, value]) => value !== null)
    .map(([field, value]) => `${field}: ${value}`);
  return `- Grade ${entry.grade}, Skill ${entry.skill}: ${fields.join(' | ')}`.trimEnd();
}

/**
 * Best-effort lookup of reference material for a skill at a target grade.
 * Grades are compared as text, skills case-insensitively. Never throws.
 */
export function retrieveContext(
  reference: Table | undefined,
  skill: string,
  targetGrade: number | string
): RetrievalResult {
  try {
    if (!reference || reference.rows.length === 0) return { kind: 'empty', reason: 'no-table' };

    const entries = toReferenceEntries(reference);
    if (!entries) return { kind: 'empty', reason: 'missing-columns' };

    const grade = String(targetGrade).trim();
    const wantedSkill = skill.trim().toLowerCase();
    const bullets = entries
      .filter(entry => entry.grade === grade && entry.skill.toLowerCase() === wantedSkill)
      .slice(0, MAX_CONTEXT_BULLETS)
      .map(formatReferenceBullet);

    return bullets.length > 0 ? { kind: 'context', bullets } : { kind: 'empty', reason: 'no-matches' };
  } catch (error) {
    console.warn(`${APP_PREFIX} Reference lookup skipped:`, error);
    return { kind: 'empty', reason: 'malformed' };
  }
}

export function contextBullets(result: RetrievalResult): string[] {
  return result.kind === 'context' ? result.bullets : [];
}
