import type {
  BatchResult,
  GenerationRequest,
  ProficiencyTier,
  ScoreRecord,
  SelectedStudent,
  StudentOutcome,
  Table,
  WorksheetGenerator,
  WorksheetParts,
  WorksheetSettings
} from '../types';
import { ANSWER_KEY_MARKER, APP_PREFIX, MISSING_ANSWER_KEY } from '../constants';
import { classifyScore, mapTierToGrade, normalizeScoreTable, toScoreRecords } from './dataService';
import { composePrompt, selectSkillInstruction } from './promptService';
import { contextBullets, retrieveContext } from './retrievalService';
import { parseSettings } from './configService';
import { describeError } from './errors';

const ANSWER_KEY_PATTERN = new RegExp(ANSWER_KEY_MARKER, 'i');

/**
 * Splits generated text at the first "ANSWER KEY:" heading (any case).
 * Without the heading the whole text is the body and the key is a placeholder.
 */
export function splitWorksheetResponse(raw: string): WorksheetParts {
  const match = ANSWER_KEY_PATTERN.exec(raw);
  if (!match) {
    return { body: raw.trim(), answerKey: MISSING_ANSWER_KEY };
  }
  return {
    body: raw.slice(0, match.index).trim(),
    answerKey: raw.slice(match.index).trim()
  };
}

export interface PipelineContext {
  readonly settings: WorksheetSettings;
  readonly records: readonly ScoreRecord[];
  readonly reference?: Table;
  readonly generator: WorksheetGenerator;
}

export function createPipelineContext(input: {
  settings: WorksheetSettings;
  scores: Table;
  reference?: Table;
  generator: WorksheetGenerator;
}): PipelineContext {
  const settings = parseSettings(input.settings);
  const records = toScoreRecords(normalizeScoreTable(input.scores), settings.actualGrade);
  return Object.freeze({
    settings,
    records,
    reference: input.reference,
    generator: input.generator
  });
}

export function selectStudents(context: PipelineContext, skill: string, tier: ProficiencyTier): SelectedStudent[] {
  const selected: SelectedStudent[] = [];
  context.records.forEach(record => {
    if (record.skill !== skill) return;
    const recordTier = classifyScore(record.score, context.settings);
    if (recordTier !== tier) return;
    selected.push({
      record,
      tier: recordTier,
      targetGrade: mapTierToGrade(recordTier, context.settings.curriculum)
    });
  });
  return selected;
}

export function buildGenerationRequest(context: PipelineContext, student: SelectedStudent): GenerationRequest {
  const { record, tier, targetGrade } = student;
  const retrieval = retrieveContext(context.reference, record.skill, targetGrade);

  return {
    studentId: record.studentId,
    studentName: record.studentName,
    actualGrade: record.actualGrade,
    targetGrade,
    skill: record.skill,
    tier,
    skillInstruction: selectSkillInstruction(record.skill),
    retrievalContext: contextBullets(retrieval),
    questionCount: context.settings.questionCount
  };
}

export interface GenerateOptions {
  onProgress?: (outcome: StudentOutcome, index: number, total: number) => void;
}

/**
 * Generates one worksheet per selected student, one at a time. A failure is
 * recorded against that student and the batch carries on.
 */
export async function generateWorksheets(
  context: PipelineContext,
  selection: SelectedStudent[],
  options: GenerateOptions = {}
): Promise<BatchResult> {
  const outcomes: StudentOutcome[] = [];

  for (let i = 0; i < selection.length; i++) {
    const { record } = selection[i];
    let outcome: StudentOutcome;
    try {
      const request = buildGenerationRequest(context, selection[i]);
      const prompt = composePrompt(request);
      const raw = await context.generator.generate(prompt);
      outcome = { status: 'generated', request, prompt, worksheet: splitWorksheetResponse(raw) };
    } catch (error) {
      console.error(`${APP_PREFIX} Generation failed for ${record.studentName} (${record.studentId}):`, error);
      outcome = {
        status: 'failed',
        studentId: record.studentId,
        studentName: record.studentName,
        error: describeError(error)
      };
    }
    outcomes.push(outcome);
    options.onProgress?.(outcome, i, selection.length);
  }

  const succeeded = outcomes.filter(o => o.status === 'generated').length;
  return { outcomes, succeeded, failed: outcomes.length - succeeded };
}
