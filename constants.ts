import type { ProficiencyTier, WorksheetSettings } from './types';

export const APP_PREFIX = 'Worksheet Studio -';

export const DEFAULT_SETTINGS: WorksheetSettings = {
  lowThreshold: 50,
  highThreshold: 75,
  curriculum: { lowGrade: 1, mediumGrade: 3, highGrade: 5 },
  actualGrade: 4,
  questionCount: 5,
  model: 'gemini-2.5-flash'
};

export const MIN_CURRICULUM_GRADE = 1;
export const MAX_CURRICULUM_GRADE = 6;
export const MIN_QUESTION_COUNT = 3;
export const MAX_QUESTION_COUNT = 10;
export const MAX_CONTEXT_BULLETS = 8;

export const TIERS: ProficiencyTier[] = ['Low', 'Medium', 'High'];

// Wide export from the school gradebook: one column per skill.
export const WIDE_ID_COLUMN = 'id';
export const WIDE_NAME_COLUMN = 'name';
export const WIDE_SKILL_COLUMNS = ['LanguageFunction', 'ReadingComprehension', 'Grammar', 'Writing'] as const;

export const CANONICAL_COLUMNS = {
  studentId: 'student_id',
  studentName: 'student_name',
  skill: 'skill',
  score: 'score'
} as const;

export const TIER_LABELS: Record<ProficiencyTier, string> = {
  Low: 'Low (needs foundational support)',
  Medium: 'Medium (developing)',
  High: 'High (ready for extension)'
};

export const ANSWER_KEY_MARKER = 'ANSWER KEY:';
export const MISSING_ANSWER_KEY = 'Answer key was not clearly provided by the generator.';

export interface SkillInstructionRule {
  keywords: string[];
  instruction: string;
}

/**
 * Checked in order; the first rule with a keyword contained in the skill name wins.
 */
export const SKILL_INSTRUCTION_RULES: SkillInstructionRule[] = [
  {
    keywords: ['grammar'],
    instruction:
      'Focus on grammar: questions should target sentence structure, verb tenses, agreement and correct word forms taken from the passage.'
  },
  {
    keywords: ['reading', 'comprehension'],
    instruction:
      'Focus on reading comprehension: include questions on the main idea, key details, sequence of events and simple inference.'
  },
  {
    keywords: ['writing'],
    instruction:
      'Focus on writing: questions should target sentence building, punctuation, linking words and choosing the best way to express an idea.'
  },
  {
    keywords: ['language', 'function'],
    instruction:
      'Focus on language functions: questions should target everyday communicative uses such as requesting, greeting, apologising and giving directions.'
  }
];

export const GENERIC_SKILL_INSTRUCTION =
  'Design questions that practise the named skill directly, using the passage as the source for every question.';

export const WORD_BANDS: Array<{ maxGrade: number; min: number; max: number }> = [
  { maxGrade: 2, min: 60, max: 90 },
  { maxGrade: 4, min: 100, max: 150 },
  { maxGrade: MAX_CURRICULUM_GRADE, min: 150, max: 200 }
];
