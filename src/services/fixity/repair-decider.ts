/**
 * Repair Decider
 *
 * Decides whether a datastream needs its checksum (re)computed and, if so,
 * re-saves it with the requested checksum type so the repository computes one.
 */

import type { ChecksumType } from '../../models/types.js';
import type { DatastreamRecord } from '../../models/datastream.js';
import type { Datastream } from '../../models/repository.js';
import { logger as defaultLogger, type Logger } from '../../core/logger.js';
import type { RunStats } from './run-stats.js';
import { describeChecksum, lacksFixity } from './checksum.js';

export interface RepairOptions {
  /** Type to save with; `DEFAULT` lets the repository pick its configured algorithm */
  checksumType: ChecksumType;
  /** Datastream IDs repaired even when a checksum is present */
  force: ReadonlySet<string>;
  /** Audit message stored with the save */
  logMessage: string;
}

export interface RepairOutcome {
  attempted: boolean;
  updated: boolean;
  error?: string;
}

/**
 * True when the checksum is absent or the datastream ID is forced
 */
export function shouldRepair(record: DatastreamRecord, force: ReadonlySet<string>): boolean {
  return lacksFixity(record.checksum) || force.has(record.dsid);
}

export class RepairDecider {
  constructor(
    private readonly stats: RunStats,
    private readonly logger: Logger = defaultLogger
  ) {}

  /**
   * Repairs the datastream if needed. A failed save is logged and counted,
   * never thrown.
   */
  async maybeRepair(datastream: Datastream, options: RepairOptions): Promise<RepairOutcome> {
    const record = await datastream.get();

    if (!shouldRepair(record, options.force)) {
      return { attempted: false, updated: false };
    }

    try {
      await datastream.save(options.checksumType, options.logMessage);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Error saving ${datastream.pid}/${datastream.dsid}: ${message}`);
      this.stats.increment('ds_err');
      return { attempted: true, updated: false, error: message };
    }

    this.logger.debug(`Updated checksum for ${datastream.pid}/${datastream.dsid}`, {
      previous: describeChecksum(record.checksum),
      checksumType: options.checksumType
    });
    this.stats.increment('ds_updated');
    return { attempted: true, updated: true };
  }
}
