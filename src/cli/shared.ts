// Options and run setup shared by the validate and repair commands

import { Command } from 'commander';
import { Logger, LogLevel, logger } from '../core/logger.js';
import { validateMax, validatePids, validateRepositoryRoot } from '../core/validation.js';
import type { FixityRepository } from '../models/repository.js';
import { ConfigService } from '../services/config/config-service.js';
import { FedoraClient, type FedoraClientConfig } from '../services/fedora/fedora-client.js';
import { PromptService, resolvePassword, type IPromptService } from '../services/prompt/prompt-service.js';
import { InterruptCoordinator, type SignalSource } from '../services/fixity/interrupt-coordinator.js';
import { ObjectWalker, type RunMode, type RunOutcome } from '../services/fixity/object-walker.js';
import { createProgress, type ProgressStream } from '../services/progress/progress-indicator.js';
import { ReportWriter } from '../services/report/report-writer.js';

/**
 * Flags common to both commands, as commander hands them over
 */
export interface CommonOptions {
  fedoraRoot?: string;
  fedoraUser?: string;
  fedoraPassword?: string;
  config?: string;
  quiet?: boolean;
  verbose?: boolean;
  max?: string;
  json?: boolean;
}

/**
 * Collaborators a command needs; replaced in tests
 */
export interface CommandDeps {
  createRepository(config: FedoraClientConfig): FixityRepository;
  prompts: IPromptService;
  out(line: string): void;
  signalSource: SignalSource;
  progressStream: ProgressStream;
}

export const defaultDeps: CommandDeps = {
  createRepository: config => new FedoraClient(config),
  prompts: new PromptService(),
  out: line => console.log(line), // eslint-disable-line no-console
  signalSource: process,
  progressStream: process.stderr
};

export interface RunContext {
  repository: FixityRepository;
  configService: ConfigService;
  targets: string[];
  max?: number;
  quiet: boolean;
  json: boolean;
}

export function addCommonOptions(command: Command): Command {
  return command
    .argument('[pids...]', 'Object PIDs to check (default: all objects in the repository)')
    .option('--fedora-root <url>', 'Base URL of the Fedora repository')
    .option('--fedora-user <name>', 'Repository user name')
    .option('--fedora-password <value>', 'Repository password (prompted for when a user is given without one)')
    .option('-c, --config <path>', 'Path to a YAML config file (default: ./fixity.yaml)')
    .option('-q, --quiet', 'Only print the summary')
    .option('-v, --verbose', 'Log repository requests and other debug output')
    .option('-m, --max <n>', 'Stop after processing this many objects')
    .option('--json', 'Print the run statistics as JSON');
}

/**
 * Validates input, connects to the repository and settles the target PIDs.
 * Everything here is fatal: no object has been touched yet.
 */
export async function prepareRun(
  pids: string[],
  options: CommonOptions,
  deps: CommandDeps
): Promise<RunContext> {
  const quiet = options.quiet === true;
  if (options.verbose) {
    Logger.configure({ level: LogLevel.DEBUG });
  } else if (quiet) {
    Logger.configure({ level: LogLevel.WARN });
  } else {
    Logger.configure({ level: LogLevel.INFO });
  }

  const configService = new ConfigService({ configPath: options.config });
  const connection = await configService.getConnection();

  const root = validateRepositoryRoot(options.fedoraRoot ?? connection.root);
  const max = options.max !== undefined ? validateMax(options.max) : undefined;
  const explicitPids = validatePids(pids);

  const user = options.fedoraUser ?? connection.user;
  const password = await resolvePassword(deps.prompts, user, options.fedoraPassword ?? connection.password);

  const repository = deps.createRepository({
    root,
    user,
    password,
    timeoutMs: connection.timeoutMs
  });

  let targets = explicitPids;
  if (targets.length === 0) {
    const modelUri = await configService.getModelUri();
    logger.debug('Discovering objects', { modelUri });
    targets = validatePids(await repository.findByModel(modelUri));
  }
  logger.debug(`Processing ${targets.length} object(s)`);

  return { repository, configService, targets, max, quiet, json: options.json === true };
}

/**
 * Runs the walk with interrupt handling and progress wired in
 */
export async function executeRun(
  context: RunContext,
  mode: RunMode,
  report: ReportWriter,
  deps: CommandDeps
): Promise<RunOutcome> {
  const interrupt = new InterruptCoordinator(deps.signalSource);
  const progress = createProgress({
    quiet: context.quiet || context.json,
    total: context.targets.length,
    stream: deps.progressStream
  });
  const walker = new ObjectWalker(context.repository, report);

  interrupt.arm();
  try {
    const outcome = await walker.run(context.targets, mode, {
      max: context.max,
      stop: interrupt,
      progress
    });

    if (outcome.stopReason === 'max-reached') {
      logger.info(`Stopped after ${outcome.stats.get('objects')} object(s) (--max)`);
    }
    return outcome;
  } finally {
    interrupt.disarm();
  }
}

/**
 * Final output: text summary lines or the statistics as JSON
 */
export function printOutcome(
  outcome: RunOutcome,
  mode: RunMode,
  summary: string[],
  context: RunContext,
  report: ReportWriter
): void {
  if (context.json) {
    report.print(JSON.stringify({
      mode: mode.kind,
      stopReason: outcome.stopReason,
      stats: outcome.stats.toJSON()
    }, null, 2));
    return;
  }

  report.print(['', ...summary]);
}
