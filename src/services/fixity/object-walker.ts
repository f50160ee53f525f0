/**
 * Object Walker
 *
 * Sequential traversal of target objects and their datastreams. Each object is
 * finished before the stop conditions (interrupt, --max) are checked, so a run
 * never leaves an object partially classified or repaired.
 */

import type { ChecksumType, MetricName } from '../../models/types.js';
import type { FixityRepository, RepositoryObject } from '../../models/repository.js';
import { logger as defaultLogger, type Logger } from '../../core/logger.js';
import type { ReportWriter } from '../report/report-writer.js';
import type { ProgressIndicator } from '../progress/progress-indicator.js';
import { RunStats } from './run-stats.js';
import { ChecksumClassifier } from './checksum-classifier.js';
import { RepairDecider } from './repair-decider.js';
import type { StopSignal } from './interrupt-coordinator.js';

export interface ValidateMode {
  kind: 'validate';
  allVersions: boolean;
  missingOnly: boolean;
}

export interface RepairMode {
  kind: 'repair';
  checksumType: ChecksumType;
  force: ReadonlySet<string>;
  logMessage: string;
}

export type RunMode = ValidateMode | RepairMode;

export interface WalkOptions {
  /** Stop once this many objects have been processed */
  max?: number;
  stop?: StopSignal;
  progress?: ProgressIndicator;
}

export type StopReason = 'completed' | 'interrupted' | 'max-reached';

export interface RunOutcome {
  stats: RunStats;
  stopReason: StopReason;
}

/**
 * Counters reported for a mode even when they stay at zero.
 * `ds_versions` exists only for all-versions runs.
 */
export function metricsFor(mode: RunMode): MetricName[] {
  if (mode.kind === 'repair') {
    return ['objects', 'ds', 'ds_updated', 'ds_err'];
  }
  return [
    'objects',
    'ds',
    ...(mode.allVersions ? (['ds_versions'] as const) : []),
    'ok',
    'invalid',
    'missing',
    'ds_err'
  ];
}

export class ObjectWalker {
  constructor(
    private readonly repository: FixityRepository,
    private readonly report: ReportWriter,
    private readonly logger: Logger = defaultLogger
  ) {}

  async run(targets: readonly string[], mode: RunMode, options: WalkOptions = {}): Promise<RunOutcome> {
    const stats = new RunStats(metricsFor(mode));
    const classifier = new ChecksumClassifier(stats, this.report);
    const decider = new RepairDecider(stats, this.logger);
    let stopReason: StopReason = 'completed';

    options.progress?.start(targets.length);
    try {
      for (const pid of targets) {
        const resolved = await this.resolve(pid);

        if (resolved) {
          for (const dsid of resolved.dsids) {
            stats.increment('ds');
            await this.processDatastream(resolved.object, dsid, mode, stats, classifier, decider);
          }
          stats.increment('objects');
        }

        options.progress?.tick();

        if (options.stop?.stopRequested) {
          stopReason = 'interrupted';
          break;
        }
        if (options.max !== undefined && stats.get('objects') >= options.max) {
          stopReason = 'max-reached';
          break;
        }
      }
    } finally {
      options.progress?.stop();
    }

    this.logger.debug('Walk finished', { stopReason, ...stats.toJSON() });
    return { stats, stopReason };
  }

  /**
   * Looks up the object and its datastream IDs; null means skip it
   */
  private async resolve(pid: string): Promise<{ object: RepositoryObject; dsids: string[] } | null> {
    try {
      const object = await this.repository.getObject(pid);
      if (!object) {
        this.logger.warn(`${pid} does not exist or is inaccessible`);
        return null;
      }
      return { object, dsids: await object.listDatastreamIds() };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Skipping ${pid}: ${message}`);
      return null;
    }
  }

  private async processDatastream(
    object: RepositoryObject,
    dsid: string,
    mode: RunMode,
    stats: RunStats,
    classifier: ChecksumClassifier,
    decider: RepairDecider
  ): Promise<void> {
    const datastream = object.datastream(dsid);

    try {
      if (mode.kind === 'validate') {
        await classifier.classify(datastream, mode);
      } else {
        await decider.maybeRepair(datastream, mode);
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Error checking ${object.pid}/${dsid}: ${message}`);
      stats.increment('ds_err');
    }
  }
}
