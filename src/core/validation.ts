// Input validation for command-line arguments

import { ValidationError } from './errors.js';
import { CHECKSUM_TYPES, DISABLED_CHECKSUM_TYPE, type ChecksumType } from '../models/types.js';

/**
 * Fedora PID syntax: namespace ":" local id
 */
const PID_PATTERN = /^([A-Za-z0-9]|-|\.)+:(([A-Za-z0-9])|-|\.|~|_|(%[0-9A-F]{2}))+$/;

/**
 * Datastream IDs are XML NCNames in Fedora
 */
const DSID_PATTERN = /^[A-Za-z_][A-Za-z0-9_.-]*$/;

/**
 * Validates the repository base URL and strips trailing slashes
 */
export function validateRepositoryRoot(root: string | undefined): string {
  if (!root || root.trim() === '') {
    throw new ValidationError(
      'Repository root is required (--fedora-root or fedora.root in the config file)',
      'fedora-root'
    );
  }

  let url: URL;
  try {
    url = new URL(root.trim());
  } catch {
    throw new ValidationError(`Invalid repository URL: ${root}`, 'fedora-root');
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ValidationError(`Repository URL must use http or https: ${root}`, 'fedora-root');
  }

  return url.toString().replace(/\/+$/, '');
}

/**
 * Validates explicit PIDs, dropping duplicates but keeping first-seen order
 */
export function validatePids(pids: string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];

  for (const raw of pids) {
    const pid = raw.trim();
    if (!PID_PATTERN.test(pid)) {
      throw new ValidationError(`Invalid PID: "${raw}"`, 'pid');
    }
    if (!seen.has(pid)) {
      seen.add(pid);
      result.push(pid);
    }
  }

  return result;
}

/**
 * Parses --max, which must be a positive integer
 */
export function validateMax(value: string): number {
  const trimmed = value.trim();
  const parsed = Number(trimmed);

  if (!/^\d+$/.test(trimmed) || !Number.isSafeInteger(parsed) || parsed < 1) {
    throw new ValidationError(`--max must be a positive integer, got "${value}"`, 'max');
  }

  return parsed;
}

/**
 * Parses the comma-separated --force list into a set of datastream IDs
 */
export function parseForceList(value: string): Set<string> {
  const ids = value
    .split(',')
    .map(id => id.trim())
    .filter(id => id.length > 0);

  for (const id of ids) {
    if (!DSID_PATTERN.test(id)) {
      throw new ValidationError(`Invalid datastream ID in --force: "${id}"`, 'force');
    }
  }

  return new Set(ids);
}

/**
 * Validates a checksum type for repair; DISABLED is never a repair target
 */
export function validateChecksumType(value: string): ChecksumType {
  const normalized = value.trim().toUpperCase();

  if (normalized === DISABLED_CHECKSUM_TYPE) {
    throw new ValidationError('Cannot repair checksums by disabling them', 'checksum-type');
  }

  const match = CHECKSUM_TYPES.find(type => type === normalized);
  if (!match) {
    throw new ValidationError(
      `Invalid checksum type "${value}". Allowed: ${CHECKSUM_TYPES.join(', ')}`,
      'checksum-type'
    );
  }

  return match;
}
