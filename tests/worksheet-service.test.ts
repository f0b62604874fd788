import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  buildGenerationRequest,
  createPipelineContext,
  generateWorksheets,
  selectStudents,
  splitWorksheetResponse
} from '../services/worksheetService';
import { parseSettings } from '../services/configService';
import { ConfigError, MissingColumnError } from '../services/errors';
import { DEFAULT_SETTINGS, MISSING_ANSWER_KEY } from '../constants';
import type { ComposedPrompt, Table, WorksheetGenerator } from '../types';

const GENERATED = 'PASSAGE:\nThe cat sat on the mat.\n\nQUESTIONS:\n1) Where did the cat sit?\nA) bed\nB) mat\nC) box\nD) car\n\nANSWER KEY:\n1) B';

const wideScores: Table = {
  columns: ['id', 'name', 'LanguageFunction', 'ReadingComprehension', 'Grammar', 'Writing'],
  rows: [
    { id: '1', name: 'Amal', LanguageFunction: '80', ReadingComprehension: '60', Grammar: '40', Writing: '90' },
    { id: '2', name: 'Omar', LanguageFunction: '45', ReadingComprehension: '70', Grammar: '55', Writing: '30' }
  ]
};

const fakeGenerator = () => {
  const generate = vi.fn(async (_prompt: ComposedPrompt) => GENERATED);
  return { generate } satisfies WorksheetGenerator;
};

afterEach(() => {
  vi.restoreAllMocks();
});

describe('splitWorksheetResponse', () => {
  it('splits at the answer key heading', () => {
    expect(splitWorksheetResponse('PASSAGE:\nfoo\nANSWER KEY:\n1) A')).toEqual({
      body: 'PASSAGE:\nfoo',
      answerKey: 'ANSWER KEY:\n1) A'
    });
  });

  it('uses a placeholder when the heading is missing', () => {
    expect(splitWorksheetResponse('no marker here')).toEqual({ body: 'no marker here', answerKey: MISSING_ANSWER_KEY });
  });

  it('finds the heading in any case', () => {
    expect(splitWorksheetResponse('  text\nAnswer Key: 1) C  ')).toEqual({ body: 'text', answerKey: 'Answer Key: 1) C' });
  });

  it('is stable once the answer key has been removed', () => {
    const { body } = splitWorksheetResponse(GENERATED);
    expect(splitWorksheetResponse(body)).toEqual({ body, answerKey: MISSING_ANSWER_KEY });
  });
});

describe('pipeline', () => {
  it('selects the low grammar students and targets the low-tier grade', () => {
    const context = createPipelineContext({ settings: parseSettings({}), scores: wideScores, generator: fakeGenerator() });

    expect(context.records).toHaveLength(8);
    const selection = selectStudents(context, 'Grammar', 'Low');
    expect(selection.map(s => s.record.studentName)).toEqual(['Amal']);
    expect(selection[0].tier).toBe('Low');
    expect(selection[0].targetGrade).toBe(1);
    expect(buildGenerationRequest(context, selection[0]).targetGrade).toBe(1);
  });

  it('keeps selection to the chosen skill', () => {
    const context = createPipelineContext({ settings: parseSettings({}), scores: wideScores, generator: fakeGenerator() });
    expect(selectStudents(context, 'Writing', 'Low').map(s => s.record.studentId)).toEqual(['2']);
    expect(selectStudents(context, 'Grammar', 'High')).toEqual([]);
  });

  it('builds a request with retrieval context for the target grade', () => {
    const reference: Table = {
      columns: ['grade', 'skill', 'topic'],
      rows: [
        { grade: '1', skill: 'grammar', topic: 'Nouns' },
        { grade: '3', skill: 'Grammar', topic: 'Adjectives' }
      ]
    };
    const context = createPipelineContext({
      settings: parseSettings({ actualGrade: 5 }),
      scores: wideScores,
      reference,
      generator: fakeGenerator()
    });
    const [amalGrammar] = selectStudents(context, 'Grammar', 'Low');

    expect(buildGenerationRequest(context, amalGrammar)).toEqual({
      studentId: '1',
      studentName: 'Amal',
      actualGrade: 5,
      targetGrade: 1,
      skill: 'Grammar',
      tier: 'Low',
      skillInstruction: expect.stringContaining('Focus on grammar'),
      retrievalContext: ['- Grade 1, Skill grammar: topic: Nouns'],
      questionCount: 5
    });
  });

  it('takes the tier and target grade from the selection', () => {
    const reference: Table = {
      columns: ['grade', 'skill', 'topic'],
      rows: [
        { grade: '1', skill: 'Grammar', topic: 'Nouns' },
        { grade: '2', skill: 'Grammar', topic: 'Verbs' }
      ]
    };
    const context = createPipelineContext({ settings: parseSettings({}), scores: wideScores, reference, generator: fakeGenerator() });
    const [amal] = selectStudents(context, 'Grammar', 'Low');

    const request = buildGenerationRequest(context, { ...amal, targetGrade: 2 });

    expect(request.tier).toBe('Low');
    expect(request.targetGrade).toBe(2);
    expect(request.retrievalContext).toEqual(['- Grade 2, Skill Grammar: topic: Verbs']);
  });

  it('generates and splits a worksheet per selected student', async () => {
    const generator = fakeGenerator();
    const context = createPipelineContext({ settings: parseSettings({}), scores: wideScores, generator });

    const result = await generateWorksheets(context, selectStudents(context, 'Grammar', 'Low'));

    expect(result.succeeded).toBe(1);
    expect(result.failed).toBe(0);
    const [outcome] = result.outcomes;
    expect(outcome.status).toBe('generated');
    if (outcome.status !== 'generated') return;
    expect(outcome.request.targetGrade).toBe(1);
    expect(outcome.worksheet.answerKey).toBe('ANSWER KEY:\n1) B');
    expect(outcome.worksheet.body.startsWith('PASSAGE:\nThe cat sat on the mat.')).toBe(true);
    expect(generator.generate).toHaveBeenCalledTimes(1);
    expect(generator.generate.mock.calls[0][0].taskInstruction).toContain('Student: Amal');
  });

  it('records a failed student and carries on with the rest', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const scores: Table = {
      columns: ['student_id', 'student_name', 'skill', 'score'],
      rows: [
        { student_id: '1', student_name: 'Amal', skill: 'Grammar', score: '10' },
        { student_id: '2', student_name: 'Omar', skill: 'Grammar', score: '20' },
        { student_id: '3', student_name: 'Sara', skill: 'Grammar', score: '30' }
      ]
    };
    const generator: WorksheetGenerator = {
      generate: async prompt => {
        if (prompt.taskInstruction.includes('Student: Omar')) throw new Error('quota exceeded');
        return GENERATED;
      }
    };
    const context = createPipelineContext({ settings: parseSettings({}), scores, generator });
    const progress = vi.fn();

    const result = await generateWorksheets(context, selectStudents(context, 'Grammar', 'Low'), { onProgress: progress });

    expect(result.outcomes.map(o => o.status)).toEqual(['generated', 'failed', 'generated']);
    expect(result.outcomes[1]).toEqual({ status: 'failed', studentId: '2', studentName: 'Omar', error: 'quota exceeded' });
    expect(result.succeeded).toBe(2);
    expect(result.failed).toBe(1);
    expect(progress).toHaveBeenCalledTimes(3);
    expect(progress.mock.calls[1][1]).toBe(1);
    expect(progress.mock.calls[1][2]).toBe(3);
    expect(error).toHaveBeenCalledTimes(1);
  });

  it('rejects settings whose low threshold is not below the high threshold', () => {
    const settings = { ...DEFAULT_SETTINGS, lowThreshold: 80, highThreshold: 50 };
    expect(() => createPipelineContext({ settings, scores: wideScores, generator: fakeGenerator() })).toThrow(ConfigError);
  });

  it('reports a missing canonical column when records are first built', () => {
    const scores: Table = { columns: ['student_id', 'name', 'skill', 'score'], rows: [] };
    expect(() => createPipelineContext({ settings: parseSettings({}), scores, generator: fakeGenerator() })).toThrow(
      MissingColumnError
    );
  });
});
