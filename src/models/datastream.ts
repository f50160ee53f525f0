import type { Checksum } from './types.js';

/**
 * Metadata snapshot of one version of a datastream
 */
export interface DatastreamRecord {
  pid: string;
  dsid: string;
  checksum: Checksum;
  mimetype: string;
  versionable: boolean;
  createdAt: Date;
}

/**
 * One non-ok classification, as exported to CSV
 */
export interface ReportRow {
  pid: string;
  dsid: string;
  createdAt: Date;
  status: 'invalid' | 'missing';
  mimetype: string;
  versionable: boolean;
}
