// Capabilities the auditor needs from a repository

import type { ChecksumType } from './types.js';
import type { DatastreamRecord } from './datastream.js';

/**
 * A single datastream of a repository object
 */
export interface Datastream {
  readonly pid: string;
  readonly dsid: string;
  /** Current version's metadata */
  get(): Promise<DatastreamRecord>;
  /** Every version, each with its own creation timestamp */
  history(): Promise<DatastreamRecord[]>;
  /** Ask the repository to recompute the content checksum of this snapshot and compare */
  verifyChecksum(snapshot: DatastreamRecord): Promise<boolean>;
  /** Re-save with the given checksum type; rejects when the repository refuses */
  save(checksumType: ChecksumType, comment: string): Promise<void>;
}

export interface RepositoryObject {
  readonly pid: string;
  listDatastreamIds(): Promise<string[]>;
  datastream(dsid: string): Datastream;
}

export interface FixityRepository {
  findByModel(modelUri: string): Promise<string[]>;
  /** Resolves to null when the object does not exist or is not accessible */
  getObject(pid: string): Promise<RepositoryObject | null>;
}
