/**
 * Fedora Client
 *
 * Repository adapter over the Fedora 3 REST API. Requests are issued one at a
 * time; an optional per-request timeout bounds a stalled call.
 */

import { RepositoryError } from '../../core/errors.js';
import { logger as defaultLogger, type Logger } from '../../core/logger.js';
import type { ChecksumType } from '../../models/types.js';
import type { DatastreamRecord } from '../../models/datastream.js';
import type { Datastream, FixityRepository, RepositoryObject } from '../../models/repository.js';
import {
  parseDatastreamHistory,
  parseDatastreamListing,
  parseDatastreamProfile,
  parseRiSearchPids,
  profileToRecord,
  readChecksumValid
} from './responses.js';

type FetchLike = (
  input: string,
  init?: RequestInit
) => Promise<Response>;

export interface FedoraClientConfig {
  /** Base URL, e.g. https://repo.example.edu/fedora */
  root: string;
  user?: string;
  password?: string;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
  logger?: Logger;
}

type QueryParams = Record<string, string | undefined>;

/**
 * Statuses meaning "does not exist or is inaccessible" for object lookups
 */
const ABSENT_STATUSES = new Set([401, 403, 404]);

function trimTrailingSlash(value: string): string {
  while (value.endsWith('/')) {
    value = value.slice(0, -1);
  }

  return value;
}

export class FedoraClient implements FixityRepository {
  private readonly root: string;
  private readonly authorization?: string;
  private readonly timeoutMs?: number;
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;

  constructor(config: FedoraClientConfig) {
    this.root = trimTrailingSlash(config.root);
    this.timeoutMs = config.timeoutMs;
    this.fetchImpl = config.fetchImpl ?? fetch;
    this.logger = config.logger ?? defaultLogger;

    if (config.user) {
      const credentials = `${config.user}:${config.password ?? ''}`;
      this.authorization = `Basic ${Buffer.from(credentials, 'utf8').toString('base64')}`;
    }
  }

  /**
   * PIDs of every object with the given content model, via the Resource Index
   */
  async findByModel(modelUri: string): Promise<string[]> {
    const query = `select ?pid where { ?pid <info:fedora/fedora-system:def/model#hasModel> <${modelUri}> }`;
    const response = await this.request('GET', '/risearch', {
      type: 'tuples',
      lang: 'sparql',
      format: 'CSV',
      flush: 'true',
      query
    });
    await this.ensureOk(response, '/risearch');
    return parseRiSearchPids(await response.text());
  }

  async getObject(pid: string): Promise<RepositoryObject | null> {
    const path = `/objects/${encodeURIComponent(pid)}`;
    const response = await this.request('GET', path, { format: 'xml' });

    if (ABSENT_STATUSES.has(response.status)) {
      this.logger.debug(`Object lookup returned ${response.status}`, { pid });
      // Release the connection; the body is never read
      await response.body?.cancel();
      return null;
    }
    await this.ensureOk(response, path);

    return new FedoraObject(this, pid);
  }

  /** @internal */
  async listDatastreamIds(pid: string): Promise<string[]> {
    const path = `/objects/${encodeURIComponent(pid)}/datastreams`;
    return parseDatastreamListing(await this.getText(path, { format: 'xml' }));
  }

  /** @internal */
  async getDatastreamRecord(pid: string, dsid: string): Promise<DatastreamRecord> {
    const xml = await this.getText(this.datastreamPath(pid, dsid), { format: 'xml' });
    return profileToRecord(pid, dsid, parseDatastreamProfile(xml));
  }

  /** @internal */
  async getDatastreamHistory(pid: string, dsid: string): Promise<DatastreamRecord[]> {
    const xml = await this.getText(`${this.datastreamPath(pid, dsid)}/history`, { format: 'xml' });
    return parseDatastreamHistory(xml).map(profile => profileToRecord(pid, dsid, profile));
  }

  /** @internal */
  async verifyChecksum(snapshot: DatastreamRecord): Promise<boolean> {
    const xml = await this.getText(this.datastreamPath(snapshot.pid, snapshot.dsid), {
      format: 'xml',
      validateChecksum: 'true',
      asOfDateTime: snapshot.createdAt.toISOString()
    });
    return readChecksumValid(snapshot.pid, snapshot.dsid, parseDatastreamProfile(xml));
  }

  /** @internal */
  async saveChecksumType(pid: string, dsid: string, checksumType: ChecksumType, comment: string): Promise<void> {
    const path = this.datastreamPath(pid, dsid);
    const response = await this.request('PUT', path, {
      checksumType,
      logMessage: comment
    });
    await this.ensureOk(response, path);
  }

  private datastreamPath(pid: string, dsid: string): string {
    return `/objects/${encodeURIComponent(pid)}/datastreams/${encodeURIComponent(dsid)}`;
  }

  private async getText(path: string, params: QueryParams): Promise<string> {
    const response = await this.request('GET', path, params);
    await this.ensureOk(response, path);
    return response.text();
  }

  private async request(method: 'GET' | 'PUT', path: string, params: QueryParams): Promise<Response> {
    const search = new URLSearchParams();
    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined) {
        search.set(key, value);
      }
    }

    const url = `${this.root}${path}?${search.toString()}`;
    const headers: Record<string, string> = {};
    if (this.authorization) {
      headers.Authorization = this.authorization;
    }

    this.logger.debug(`${method} ${path}`);
    try {
      return await this.fetchImpl(url, {
        method,
        headers,
        signal: this.timeoutMs !== undefined ? AbortSignal.timeout(this.timeoutMs) : undefined
      });
    } catch (error) {
      if (error instanceof Error && error.name === 'TimeoutError') {
        throw new RepositoryError(`${method} ${path} timed out after ${this.timeoutMs}ms`, undefined, path);
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new RepositoryError(`${method} ${path} failed: ${message}`, undefined, path);
    }
  }

  private async ensureOk(response: Response, path: string): Promise<void> {
    if (response.ok) {
      return;
    }

    const body = (await response.text()).trim().slice(0, 200);
    const detail = body ? `: ${body}` : '';
    throw new RepositoryError(
      `Repository returned ${response.status} ${response.statusText} for ${path}${detail}`,
      response.status,
      path
    );
  }
}

class FedoraObject implements RepositoryObject {
  constructor(
    private readonly client: FedoraClient,
    readonly pid: string
  ) {}

  listDatastreamIds(): Promise<string[]> {
    return this.client.listDatastreamIds(this.pid);
  }

  datastream(dsid: string): Datastream {
    return new FedoraDatastream(this.client, this.pid, dsid);
  }
}

class FedoraDatastream implements Datastream {
  constructor(
    private readonly client: FedoraClient,
    readonly pid: string,
    readonly dsid: string
  ) {}

  get(): Promise<DatastreamRecord> {
    return this.client.getDatastreamRecord(this.pid, this.dsid);
  }

  history(): Promise<DatastreamRecord[]> {
    return this.client.getDatastreamHistory(this.pid, this.dsid);
  }

  verifyChecksum(snapshot: DatastreamRecord): Promise<boolean> {
    return this.client.verifyChecksum(snapshot);
  }

  save(checksumType: ChecksumType, comment: string): Promise<void> {
    return this.client.saveChecksumType(this.pid, this.dsid, checksumType, comment);
  }
}
