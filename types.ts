
export type ProficiencyTier = 'Low' | 'Medium' | 'High';

export type CellValue = string | number | null;

export type TableRow = Record<string, CellValue>;

export interface Table {
  columns: string[];
  rows: TableRow[];
}

export interface ScoreRecord {
  readonly studentId: string;
  readonly studentName: string;
  readonly skill: string;
  readonly score: number; // 0-100
  readonly actualGrade: number;
}

export interface ThresholdConfig {
  lowThreshold: number;
  highThreshold: number;
}

export interface CurriculumMapping {
  lowGrade: number;
  mediumGrade: number;
  highGrade: number;
}

export interface WorksheetSettings extends ThresholdConfig {
  curriculum: CurriculumMapping;
  actualGrade: number;
  questionCount: number;
  model: string;
}

export interface CurriculumReferenceEntry {
  grade: string;
  skill: string;
  details: Array<[field: string, value: string | null]>;
}

export type RetrievalResult =
  | { kind: 'context'; bullets: string[] }
  | { kind: 'empty'; reason: 'no-table' | 'missing-columns' | 'no-matches' | 'malformed' };

export interface GenerationRequest {
  studentId: string;
  studentName: string;
  actualGrade: number;
  targetGrade: number;
  skill: string;
  tier: ProficiencyTier;
  skillInstruction: string;
  retrievalContext: string[];
  questionCount: number;
}

export interface ComposedPrompt {
  roleInstruction: string;
  taskInstruction: string;
}

export interface WorksheetParts {
  body: string;
  answerKey: string;
}

export interface WorksheetGenerator {
  generate(prompt: ComposedPrompt): Promise<string>;
}

export interface SelectedStudent {
  record: ScoreRecord;
  tier: ProficiencyTier;
  targetGrade: number;
}

export type StudentOutcome =
  | {
      status: 'generated';
      request: GenerationRequest;
      prompt: ComposedPrompt;
      worksheet: WorksheetParts;
    }
  | {
      status: 'failed';
      studentId: string;
      studentName: string;
      error: string;
    };

export interface BatchResult {
  outcomes: StudentOutcome[];
  succeeded: number;
  failed: number;
}

export interface SkillTierSummary {
  skill: string;
  counts: Record<ProficiencyTier, number>;
  averageScore: number;
}
