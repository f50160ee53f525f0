/**
 * Report Writer
 *
 * Collects the human-readable status lines and, when a CSV export was
 * requested, the structured rows for every non-ok classification.
 */

import type { DatastreamRecord, ReportRow } from '../../models/datastream.js';

export interface ReportWriterOptions {
  /** Suppress per-datastream status lines */
  quiet?: boolean;
  /** Keep structured rows for CSV export */
  collectRows?: boolean;
  /** Line sink; defaults to stdout */
  out?: (line: string) => void;
}

export class ReportWriter {
  private readonly quiet: boolean;
  private readonly collectRows: boolean;
  private readonly out: (line: string) => void;
  private readonly rows: ReportRow[] = [];

  constructor(options: ReportWriterOptions = {}) {
    this.quiet = options.quiet ?? false;
    this.collectRows = options.collectRows ?? false;
    this.out = options.out ?? ((line: string) => console.log(line)); // eslint-disable-line no-console
  }

  /**
   * Records one invalid or missing checksum
   */
  recordFinding(record: DatastreamRecord, status: ReportRow['status']): void {
    if (!this.quiet) {
      this.out(formatFinding(record, status));
    }

    if (this.collectRows) {
      this.rows.push({
        pid: record.pid,
        dsid: record.dsid,
        createdAt: record.createdAt,
        status,
        mimetype: record.mimetype,
        versionable: record.versionable
      });
    }
  }

  getRows(): readonly ReportRow[] {
    return this.rows;
  }

  /**
   * Prints lines regardless of quiet mode (summaries, final notices)
   */
  print(lines: string | readonly string[]): void {
    for (const line of typeof lines === 'string' ? [lines] : lines) {
      this.out(line);
    }
  }
}

/**
 * `<pid>/<dsid> - <status> checksum (<timestamp>)`
 */
export function formatFinding(record: DatastreamRecord, status: ReportRow['status']): string {
  return `${record.pid}/${record.dsid} - ${status} checksum (${record.createdAt.toISOString()})`;
}
