import { mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { parseArgs } from 'node:util';
import type { ProficiencyTier, Table, WorksheetGenerator } from './types';
import { APP_PREFIX, TIERS } from './constants';
import { parseCSVTable } from './services/dataService';
import { loadEnvironment, loadSettings } from './services/configService';
import { createGeminiGenerator } from './services/geminiService';
import { composePrompt } from './services/promptService';
import { renderClassOverview } from './services/overviewService';
import { renderWorksheetPdf, worksheetFileName } from './services/reportService';
import { buildGenerationRequest, createPipelineContext, generateWorksheets, selectStudents } from './services/worksheetService';
import { ConfigError, GenerationError, WorksheetError, describeError } from './services/errors';

const USAGE = `Usage: worksheets --scores <scores.csv> [--reference <bank.csv>] [--config <settings.json>]
                  [--skill <skill> --tier <Low|Medium|High>] [--out <dir>] [--overview <file.html>] [--dry-run]`;

export interface CliDependencies {
  generator?: WorksheetGenerator;
  env?: NodeJS.ProcessEnv;
}

function readTable(path: string): Table {
  try {
    return parseCSVTable(readFileSync(path, 'utf8'));
  } catch (error) {
    throw new ConfigError(`Could not read ${path}: ${describeError(error)}`);
  }
}

function parseTier(value: string): ProficiencyTier {
  const tier = TIERS.find(t => t.toLowerCase() === value.trim().toLowerCase());
  if (!tier) throw new ConfigError(`Unknown tier "${value}". Expected one of ${TIERS.join(', ')}`);
  return tier;
}

const dryRunGenerator: WorksheetGenerator = {
  generate: () => Promise.reject(new GenerationError('Generation is disabled in dry-run mode'))
};

/**
 * Returns the process exit code: 0 on success, 1 on bad input, 2 when any
 * student's worksheet could not be generated.
 */
export async function main(argv: string[], deps: CliDependencies = {}): Promise<number> {
  try {
    const { values } = parseArgs({
      args: argv,
      options: {
        scores: { type: 'string' },
        reference: { type: 'string' },
        config: { type: 'string' },
        skill: { type: 'string' },
        tier: { type: 'string' },
        out: { type: 'string', default: 'worksheets' },
        overview: { type: 'string' },
        'dry-run': { type: 'boolean', default: false }
      }
    });

    if (!values.scores || Boolean(values.skill) !== Boolean(values.tier) || (!values.overview && !values.skill)) {
      console.error(USAGE);
      return 1;
    }

    const settings = loadSettings(values.config);
    const dryRun = values['dry-run'] === true;

    let generator = deps.generator ?? dryRunGenerator;
    if (!deps.generator && !dryRun && values.skill) {
      const env = loadEnvironment(deps.env);
      generator = createGeminiGenerator({ apiKey: env.apiKey, model: env.model ?? settings.model });
    }

    const context = createPipelineContext({
      settings,
      scores: readTable(values.scores),
      reference: values.reference ? readTable(values.reference) : undefined,
      generator
    });
    console.log(`${APP_PREFIX} Loaded ${context.records.length} score rows.`);

    if (values.overview) {
      writeFileSync(values.overview, renderClassOverview(context.records, settings));
      console.log(`${APP_PREFIX} Class overview written to ${values.overview}`);
    }

    if (!values.skill || !values.tier) return 0;

    const selection = selectStudents(context, values.skill, parseTier(values.tier));
    console.log(`${APP_PREFIX} ${selection.length} student(s) in ${values.skill} / ${values.tier}.`);

    if (dryRun) {
      selection.forEach(student => {
        const { record } = student;
        const prompt = composePrompt(buildGenerationRequest(context, student));
        console.log(`\n=== ${record.studentName} (${record.studentId}) ===\n${prompt.taskInstruction}`);
      });
      return 0;
    }

    const outDir = values.out ?? 'worksheets';
    mkdirSync(outDir, { recursive: true });

    const result = await generateWorksheets(context, selection, {
      onProgress: (outcome, index, total) => {
        const status = outcome.status === 'generated' ? 'generated' : `failed - ${outcome.error}`;
        const name = outcome.status === 'generated' ? outcome.request.studentName : outcome.studentName;
        console.log(`${APP_PREFIX} [${index + 1}/${total}] ${name}: ${status}`);
      }
    });

    let unsaved = 0;
    result.outcomes.forEach(outcome => {
      if (outcome.status !== 'generated') return;
      const { request, worksheet } = outcome;
      const title = `${request.studentName} - ${request.skill} (Grade ${request.targetGrade})`;
      try {
        writeFileSync(
          join(outDir, worksheetFileName(request.studentId, request.studentName, request.skill, 'worksheet')),
          renderWorksheetPdf(title, worksheet.body)
        );
        writeFileSync(
          join(outDir, worksheetFileName(request.studentId, request.studentName, request.skill, 'answer-key')),
          renderWorksheetPdf(`${title} - Answer Key`, worksheet.answerKey)
        );
      } catch (error) {
        unsaved++;
        console.error(`${APP_PREFIX} Could not save worksheet for ${request.studentName} (${request.studentId}):`, error);
      }
    });

    console.log(`${APP_PREFIX} Done: ${result.succeeded - unsaved} saved to ${outDir}, ${result.failed + unsaved} failed.`);
    return result.failed + unsaved > 0 ? 2 : 0;
  } catch (error) {
    if (error instanceof WorksheetError) {
      console.error(`${APP_PREFIX} ${error.message}`);
      return 1;
    }
    throw error;
  }
}
