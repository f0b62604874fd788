import type {
  CellValue,
  CurriculumMapping,
  ProficiencyTier,
  ScoreRecord,
  Table,
  TableRow,
  ThresholdConfig
} from '../types';
import {
  CANONICAL_COLUMNS,
  WIDE_ID_COLUMN,
  WIDE_NAME_COLUMN,
  WIDE_SKILL_COLUMNS
} from '../constants';
import { InvalidValueError, MissingColumnError } from './errors';

/**
 * Boundary scores belong to the higher tier: a score equal to a threshold
 * is never classified below it.
 */
export function classifyScore(score: number, thresholds: ThresholdConfig): ProficiencyTier {
  if (score < thresholds.lowThreshold) return 'Low';
  if (score < thresholds.highThreshold) return 'Medium';
  return 'High';
}

export function mapTierToGrade(tier: ProficiencyTier, mapping: CurriculumMapping): number {
  switch (tier) {
    case 'Low': return mapping.lowGrade;
    case 'Medium': return mapping.mediumGrade;
    case 'High': return mapping.highGrade;
  }
}

/**
 * Quote-aware scan over the whole text, so a quoted cell may span line breaks.
 */
function scanCSV(content: string): string[][] {
  const records: string[][] = [];
  let record: string[] = [];
  let current = '';
  let inQuotes = false;
  for (let i = 0; i < content.length; i++) {
    const char = content[i];
    if (char === '"') {
      if (inQuotes && content[i + 1] === '"') {
        current += '"';
        i++;
      } else {
        inQuotes = !inQuotes;
      }
    } else if (char === ',' && !inQuotes) {
      record.push(current.trim());
      current = '';
    } else if ((char === '\n' || char === '\r') && !inQuotes) {
      if (char === '\r' && content[i + 1] === '\n') i++;
      record.push(current.trim());
      records.push(record);
      record = [];
      current = '';
    } else {
      current += char;
    }
  }
  record.push(current.trim());
  records.push(record);
  return records;
}

export function parseCSVRow(row: string): string[] {
  return scanCSV(row)[0];
}

/**
 * Parses CSV text into a table keyed by the header row. Cells stay strings;
 * empty cells become null and blank lines are skipped.
 */
export function parseCSVTable(fileContent: string): Table {
  const records = scanCSV(fileContent.replace(/^\uFEFF/, '')).filter(cols => cols.some(cell => cell.length > 0));
  if (records.length === 0) return { columns: [], rows: [] };

  const columns = records[0];
  const parsed: TableRow[] = [];

  for (let i = 1; i < records.length; i++) {
    const cols = records[i];
    const row: TableRow = {};
    columns.forEach((column, index) => {
      const cell = cols[index];
      row[column] = cell === undefined || cell === '' ? null : cell;
    });
    parsed.push(row);
  }
  return { columns, rows: parsed };
}

function isWideTable(table: Table): boolean {
  const required = [WIDE_ID_COLUMN, WIDE_NAME_COLUMN, ...WIDE_SKILL_COLUMNS];
  return required.every(column => table.columns.includes(column));
}

/**
 * Reshapes the wide gradebook export (one column per skill) into one row per
 * student per skill. Anything else is assumed canonical and returned as is.
 */
export function normalizeScoreTable(table: Table): Table {
  if (!isWideTable(table)) return table;

  const rows: TableRow[] = [];
  table.rows.forEach(row => {
    WIDE_SKILL_COLUMNS.forEach(skill => {
      rows.push({
        [CANONICAL_COLUMNS.studentId]: row[WIDE_ID_COLUMN] ?? null,
        [CANONICAL_COLUMNS.studentName]: row[WIDE_NAME_COLUMN] ?? null,
        [CANONICAL_COLUMNS.skill]: skill,
        [CANONICAL_COLUMNS.score]: row[skill] ?? null
      });
    });
  });

  return {
    columns: [CANONICAL_COLUMNS.studentId, CANONICAL_COLUMNS.studentName, CANONICAL_COLUMNS.skill, CANONICAL_COLUMNS.score],
    rows
  };
}

function cellText(value: CellValue | undefined): string {
  return value === null || value === undefined ? '' : String(value).trim();
}

function parseScore(value: CellValue | undefined, rowNumber: number): number {
  const score = typeof value === 'number' ? value : cellText(value) === '' ? NaN : Number(cellText(value));
  if (!Number.isFinite(score)) {
    throw new InvalidValueError(`Row ${rowNumber}: score "${cellText(value)}" is not a number`);
  }
  return score;
}

export function toScoreRecords(table: Table, actualGrade: number): ScoreRecord[] {
  Object.values(CANONICAL_COLUMNS).forEach(column => {
    if (!table.columns.includes(column)) throw new MissingColumnError(column);
  });

  return table.rows.map((row, index) => Object.freeze({
    studentId: cellText(row[CANONICAL_COLUMNS.studentId]),
    studentName: cellText(row[CANONICAL_COLUMNS.studentName]),
    skill: cellText(row[CANONICAL_COLUMNS.skill]),
    score: parseScore(row[CANONICAL_COLUMNS.score], index + 1),
    actualGrade
  }));
}
