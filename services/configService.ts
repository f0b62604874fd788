import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { WorksheetSettings } from '../types';
import {
  DEFAULT_SETTINGS,
  MAX_CURRICULUM_GRADE,
  MAX_QUESTION_COUNT,
  MIN_CURRICULUM_GRADE,
  MIN_QUESTION_COUNT
} from '../constants';
import { ConfigError, describeError } from './errors';

const gradeSchema = z.number().int().min(MIN_CURRICULUM_GRADE).max(MAX_CURRICULUM_GRADE);
const thresholdSchema = z.number().min(0).max(100);

export const settingsSchema = z
  .object({
    lowThreshold: thresholdSchema.default(DEFAULT_SETTINGS.lowThreshold),
    highThreshold: thresholdSchema.default(DEFAULT_SETTINGS.highThreshold),
    curriculum: z
      .object({
        lowGrade: gradeSchema.default(DEFAULT_SETTINGS.curriculum.lowGrade),
        mediumGrade: gradeSchema.default(DEFAULT_SETTINGS.curriculum.mediumGrade),
        highGrade: gradeSchema.default(DEFAULT_SETTINGS.curriculum.highGrade)
      })
      .default({}),
    actualGrade: gradeSchema.default(DEFAULT_SETTINGS.actualGrade),
    questionCount: z.number().int().min(MIN_QUESTION_COUNT).max(MAX_QUESTION_COUNT).default(DEFAULT_SETTINGS.questionCount),
    model: z.string().min(1).default(DEFAULT_SETTINGS.model)
  })
  .refine(s => s.lowThreshold < s.highThreshold, {
    message: 'lowThreshold must be lower than highThreshold',
    path: ['lowThreshold']
  });

export function parseSettings(input: unknown): WorksheetSettings {
  const result = settingsSchema.safeParse(input);
  if (!result.success) {
    const details = result.error.issues
      .map(issue => `${issue.path.join('.') || 'settings'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid settings - ${details}`);
  }
  return result.data;
}

export function loadSettings(path?: string): WorksheetSettings {
  if (!path) return parseSettings({});

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf8'));
  } catch (error) {
    throw new ConfigError(`Could not read settings file ${path}: ${describeError(error)}`);
  }
  return parseSettings(raw);
}

export interface Environment {
  apiKey: string;
  model?: string;
}

export function loadEnvironment(env: NodeJS.ProcessEnv = process.env): Environment {
  const apiKey = env.GEMINI_API_KEY || env.API_KEY || '';
  return { apiKey, model: env.GEMINI_MODEL || undefined };
}
