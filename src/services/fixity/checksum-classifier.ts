/**
 * Checksum Classifier
 *
 * Decides whether a datastream version's recorded fixity is ok, invalid or
 * missing, and records the outcome in the run's statistics and report.
 */

import type { ChecksumStatus } from '../../models/types.js';
import type { DatastreamRecord } from '../../models/datastream.js';
import type { Datastream } from '../../models/repository.js';
import type { RunStats } from './run-stats.js';
import type { ReportWriter } from '../report/report-writer.js';
import { lacksFixity } from './checksum.js';

export interface ClassifyOptions {
  /** Check every historical version instead of only the current one */
  allVersions: boolean;
  /** Skip repository verification and only look for absent checksums */
  missingOnly: boolean;
}

export interface Classification {
  record: DatastreamRecord;
  status: ChecksumStatus;
}

/**
 * Pure status decision.
 *
 * `verified` is the repository's verification result, or null when
 * verification was skipped. An absent checksum is `missing` whatever the
 * verification said.
 */
export function determineStatus(record: DatastreamRecord, verified: boolean | null): ChecksumStatus {
  if (lacksFixity(record.checksum)) {
    return 'missing';
  }
  return verified === false ? 'invalid' : 'ok';
}

export class ChecksumClassifier {
  constructor(
    private readonly stats: RunStats,
    private readonly report: ReportWriter
  ) {}

  /**
   * Classifies the current version, or every version when `allVersions` is set.
   * Each version is decided on its own metadata.
   */
  async classify(datastream: Datastream, options: ClassifyOptions): Promise<Classification[]> {
    const records = options.allVersions
      ? await datastream.history()
      : [await datastream.get()];

    const results: Classification[] = [];
    for (const record of records) {
      if (options.allVersions) {
        this.stats.increment('ds_versions');
      }
      results.push(await this.classifyRecord(datastream, record, options.missingOnly));
    }
    return results;
  }

  private async classifyRecord(
    datastream: Datastream,
    record: DatastreamRecord,
    missingOnly: boolean
  ): Promise<Classification> {
    // Absent checksums are missing whatever the repository would answer
    let verified: boolean | null = null;
    if (!missingOnly && !lacksFixity(record.checksum)) {
      verified = await datastream.verifyChecksum(record);
    }

    const status = determineStatus(record, verified);
    this.stats.increment(status);

    if (status !== 'ok') {
      this.report.recordFinding(record, status);
    }

    return { record, status };
  }
}
