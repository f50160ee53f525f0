// In-process repository stand-in shared by the traversal and CLI tests

import { RepositoryError } from './core/errors.js';
import type { ChecksumType } from './models/types.js';
import type { DatastreamRecord } from './models/datastream.js';
import type { Datastream, FixityRepository, RepositoryObject } from './models/repository.js';
import { parseChecksum } from './services/fixity/checksum.js';

export const DEFAULT_CREATED_AT = '2020-01-01T00:00:00.000Z';

export interface VersionSpec {
  type?: string;
  value?: string;
  /** Result the repository gives when asked to verify this version */
  valid?: boolean;
  mimetype?: string;
  versionable?: boolean;
  createdAt?: string;
}

export interface DatastreamSpec {
  /** Newest first, as the repository lists history */
  versions: VersionSpec[];
  saveError?: string;
  readError?: string;
  verifyError?: string;
}

export type ObjectSpec = Record<string, DatastreamSpec>;

export interface SaveCall {
  pid: string;
  dsid: string;
  checksumType: ChecksumType;
  comment: string;
}

export interface FakeRepositoryOptions {
  /** Result of findByModel; defaults to every object key */
  members?: string[];
  /** PIDs whose lookup fails with a repository error */
  brokenPids?: string[];
}

export function makeRecord(pid: string, dsid: string, spec: VersionSpec = {}): DatastreamRecord {
  return {
    pid,
    dsid,
    checksum: parseChecksum(spec.type ?? 'MD5', spec.value ?? 'abc123'),
    mimetype: spec.mimetype ?? 'text/xml',
    versionable: spec.versionable ?? true,
    createdAt: new Date(spec.createdAt ?? DEFAULT_CREATED_AT)
  };
}

/**
 * Shorthand for a datastream with a single version
 */
export function single(spec: VersionSpec = {}): DatastreamSpec {
  return { versions: [spec] };
}

export class FakeRepository implements FixityRepository {
  readonly modelQueries: string[] = [];
  readonly lookups: string[] = [];
  readonly verifications: string[] = [];
  readonly saves: SaveCall[] = [];
  /** Called at the start of each object lookup */
  onGetObject?: (pid: string) => void;

  constructor(
    private readonly objects: Record<string, ObjectSpec>,
    private readonly options: FakeRepositoryOptions = {}
  ) {}

  async findByModel(modelUri: string): Promise<string[]> {
    this.modelQueries.push(modelUri);
    return this.options.members ?? Object.keys(this.objects);
  }

  async getObject(pid: string): Promise<RepositoryObject | null> {
    this.lookups.push(pid);
    this.onGetObject?.(pid);
    if (this.options.brokenPids?.includes(pid)) {
      throw new RepositoryError(`Repository returned 500 for /objects/${pid}`, 500);
    }
    const spec = this.objects[pid];
    return spec ? new FakeObject(this, pid, spec) : null;
  }
}

class FakeObject implements RepositoryObject {
  constructor(
    private readonly repository: FakeRepository,
    readonly pid: string,
    private readonly spec: ObjectSpec
  ) {}

  async listDatastreamIds(): Promise<string[]> {
    return Object.keys(this.spec);
  }

  datastream(dsid: string): Datastream {
    const spec = this.spec[dsid];
    if (!spec) {
      throw new RepositoryError(`No datastream ${dsid} on ${this.pid}`, 404);
    }
    return new FakeDatastream(this.repository, this.pid, dsid, spec);
  }
}

class FakeDatastream implements Datastream {
  constructor(
    private readonly repository: FakeRepository,
    readonly pid: string,
    readonly dsid: string,
    private readonly spec: DatastreamSpec
  ) {}

  async get(): Promise<DatastreamRecord> {
    this.failIfUnreadable();
    return makeRecord(this.pid, this.dsid, this.spec.versions[0]);
  }

  async history(): Promise<DatastreamRecord[]> {
    this.failIfUnreadable();
    return this.spec.versions.map(version => makeRecord(this.pid, this.dsid, version));
  }

  async verifyChecksum(snapshot: DatastreamRecord): Promise<boolean> {
    const iso = snapshot.createdAt.toISOString();
    this.repository.verifications.push(`${this.pid}/${this.dsid}@${iso}`);
    if (this.spec.verifyError) {
      throw new RepositoryError(this.spec.verifyError, 500);
    }
    const version = this.spec.versions.find(v => (v.createdAt ?? DEFAULT_CREATED_AT) === iso);
    return version?.valid ?? true;
  }

  async save(checksumType: ChecksumType, comment: string): Promise<void> {
    if (this.spec.saveError) {
      throw new RepositoryError(this.spec.saveError, 500);
    }
    this.repository.saves.push({ pid: this.pid, dsid: this.dsid, checksumType, comment });
  }

  private failIfUnreadable(): void {
    if (this.spec.readError) {
      throw new RepositoryError(this.spec.readError, 500);
    }
  }
}
