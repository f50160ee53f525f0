// Validate command - report missing and invalid datastream checksums

import { Command } from 'commander';
import { logger } from '../../core/logger.js';
import type { ValidateMode } from '../../services/fixity/object-walker.js';
import type { RunStats } from '../../services/fixity/run-stats.js';
import { ReportWriter } from '../../services/report/report-writer.js';
import { assertCsvWritable, writeCsvReport } from '../../services/report/csv-export.js';
import { renderValidateSummary } from '../../services/report/summary.js';
import { withErrorHandling } from '../utils/error-handler.js';
import {
  addCommonOptions,
  defaultDeps,
  executeRun,
  prepareRun,
  printOutcome,
  type CommandDeps,
  type CommonOptions
} from '../shared.js';

export interface ValidateOptions extends CommonOptions {
  csvFile?: string;
  allVersions?: boolean;
  missingOnly?: boolean;
}

/**
 * Any invalid, missing or unreadable checksum fails the run
 */
export function validateExitCode(stats: RunStats): number {
  return stats.get('invalid') + stats.get('missing') + stats.get('ds_err') > 0 ? 1 : 0;
}

export async function runValidate(
  pids: string[],
  options: ValidateOptions,
  deps: CommandDeps = defaultDeps
): Promise<number> {
  if (options.csvFile !== undefined) {
    await assertCsvWritable(options.csvFile);
  }

  const context = await prepareRun(pids, options, deps);
  const mode: ValidateMode = {
    kind: 'validate',
    allVersions: options.allVersions === true,
    missingOnly: options.missingOnly === true
  };
  const report = new ReportWriter({
    quiet: context.quiet || context.json,
    collectRows: options.csvFile !== undefined,
    out: deps.out
  });

  const outcome = await executeRun(context, mode, report, deps);

  printOutcome(outcome, mode, renderValidateSummary(outcome.stats, mode), context, report);

  if (options.csvFile !== undefined) {
    await writeCsvReport(options.csvFile, report.getRows());
    logger.info(`Wrote ${report.getRows().length} row(s) to ${options.csvFile}`);
  }

  return validateExitCode(outcome.stats);
}

export const validateCommand = addCommonOptions(
  new Command('validate')
    .description('Check datastream checksums and report missing or invalid ones')
    .option('--csv-file <path>', 'Write invalid and missing checksums to a CSV file')
    .option('-a, --all-versions', 'Check every version of each datastream')
    .option('--missing-only', 'Only look for missing checksums, skipping verification')
).action(withErrorHandling(async (pids: string[], options: ValidateOptions) => {
  process.exitCode = await runValidate(pids, options);
}));
