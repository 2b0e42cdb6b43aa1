/**
 * flood-reports CLI
 *
 * Usage:
 *   flood-reports generate [input.csv] [options]
 *
 * Options:
 *   -o, --out <dir>   Output directory (default: FLOOD_REPORTS_OUTPUT_DIR or "reports")
 *   -q, --quiet       Do not print preview tables
 */

import { Command } from 'commander';

import { createConfig, parseEnv, type AppConfig } from '../infra/config/index.js';
import { createChildLogger, createLogger } from '../infra/logger/index.js';
import { runPipeline, type PipelineOutcome } from '../modules/pipeline/index.js';
import { createFsProjectSource } from '../modules/projects/index.js';
import {
  COST_OVERRUN_TREND_DISPLAY,
  REGIONAL_EFFICIENCY_DISPLAY,
  TOP_CONTRACTOR_DISPLAY,
  createFsReportSink,
  formatJson,
  renderTable,
  toSummaryJson,
} from '../modules/reports/index.js';

export const CLI_NAME = 'flood-reports';
export const CLI_VERSION = '1.0.0';

interface GenerateOptions {
  readonly out?: string;
  readonly quiet?: boolean;
}

export interface GenerateSettings {
  readonly inputPath: string;
  readonly outputDir: string;
  readonly quiet: boolean;
}

/**
 * Merges CLI arguments over environment configuration.
 * Throws when no input file is named either way.
 */
export function resolveGenerateSettings(
  input: string | undefined,
  options: GenerateOptions,
  config: AppConfig
): GenerateSettings {
  const inputPath = input ?? config.dataset.inputPath;
  if (inputPath === undefined) {
    throw new Error('No input file: pass <input.csv> or set FLOOD_REPORTS_INPUT');
  }
  return {
    inputPath,
    outputDir: options.out ?? config.dataset.outputDir,
    quiet: options.quiet === true,
  };
}

/**
 * Preview tables for the terminal, in report order.
 */
export function renderPreview(outcome: PipelineOutcome): string {
  const { reports } = outcome;
  return [
    'Report 1: Regional Flood Mitigation Efficiency',
    renderTable(reports.regionalEfficiency.rows, REGIONAL_EFFICIENCY_DISPLAY),
    '',
    'Report 2: Top Contractors Performance Ranking',
    renderTable(reports.topContractors.rows, TOP_CONTRACTOR_DISPLAY),
    '',
    'Report 3: Annual Project Type Cost Overrun Trends',
    renderTable(reports.costOverrunTrends.rows, COST_OVERRUN_TREND_DISPLAY),
    '',
    'Summary',
    formatJson(toSummaryJson(reports.summary)),
  ].join('\n');
}

async function executeGenerate(input: string | undefined, options: GenerateOptions): Promise<void> {
  const config = createConfig(parseEnv(process.env));
  const settings = resolveGenerateSettings(input, options, config);
  const logger = createChildLogger(createLogger(config.logger), { command: 'generate' });

  const result = await runPipeline({
    source: createFsProjectSource({ filePath: settings.inputPath }),
    sink: createFsReportSink({ outputDir: settings.outputDir }),
    logger,
  });

  if (result.isErr()) {
    process.stderr.write(`Error: ${result.error.message}\n`);
    process.exitCode = 1;
    return;
  }

  if (!settings.quiet) {
    process.stdout.write(renderPreview(result.value));
  }
  process.stdout.write(`Wrote ${String(result.value.written.length)} files to ${settings.outputDir}\n`);
}

/**
 * Builds the command tree.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name(CLI_NAME)
    .description('Reports on flood-control project spending, delays and cost overruns')
    .version(CLI_VERSION);

  program
    .command('generate [input]')
    .description('Load a project CSV and write Report1-3.csv, summary.json and run-log.json')
    .option('-o, --out <dir>', 'Output directory')
    .option('-q, --quiet', 'Do not print preview tables')
    .action(async (input: string | undefined, options: GenerateOptions) => {
      await executeGenerate(input, options);
    });

  return program;
}
