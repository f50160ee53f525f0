// Repair command - have the repository compute missing checksums

import { Command } from 'commander';
import { parseForceList, validateChecksumType } from '../../core/validation.js';
import type { RepairMode } from '../../services/fixity/object-walker.js';
import type { RunStats } from '../../services/fixity/run-stats.js';
import { ReportWriter } from '../../services/report/report-writer.js';
import { renderRepairSummary } from '../../services/report/summary.js';
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

export interface RepairOptions extends CommonOptions {
  checksumType?: string;
  force?: string;
}

export function repairExitCode(stats: RunStats): number {
  return stats.get('ds_err') > 0 ? 1 : 0;
}

export async function runRepair(
  pids: string[],
  options: RepairOptions,
  deps: CommandDeps = defaultDeps
): Promise<number> {
  const checksumTypeFlag = options.checksumType !== undefined
    ? validateChecksumType(options.checksumType)
    : undefined;
  const force = options.force !== undefined ? parseForceList(options.force) : new Set<string>();

  const context = await prepareRun(pids, options, deps);
  const repairConfig = await context.configService.getRepairConfig();
  const mode: RepairMode = {
    kind: 'repair',
    checksumType: checksumTypeFlag ?? repairConfig.checksumType,
    force,
    logMessage: repairConfig.logMessage
  };
  const report = new ReportWriter({ quiet: context.quiet || context.json, out: deps.out });

  const outcome = await executeRun(context, mode, report, deps);

  printOutcome(outcome, mode, renderRepairSummary(outcome.stats), context, report);
  return repairExitCode(outcome.stats);
}

export const repairCommand = addCommonOptions(
  new Command('repair')
    .description('Have the repository compute checksums for datastreams that lack one')
    .option('--checksum-type <type>', 'Checksum type to save with (default: the repository default)')
    .option('--force <ids>', 'Comma-separated datastream IDs to repair even when a checksum exists')
).action(withErrorHandling(async (pids: string[], options: RepairOptions) => {
  process.exitCode = await runRepair(pids, options);
}));
