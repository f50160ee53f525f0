// Core type definitions for the fixity auditor

/**
 * Checksum algorithms a repository can record; `DEFAULT` asks the
 * repository to use its configured algorithm.
 */
export const CHECKSUM_TYPES = ['DEFAULT', 'MD5', 'SHA-1', 'SHA-256', 'SHA-384', 'SHA-512'] as const;
export type ChecksumType = typeof CHECKSUM_TYPES[number];

/**
 * Wire sentinels meaning "no fixity information recorded"
 */
export const DISABLED_CHECKSUM_TYPE = 'DISABLED';
export const NO_CHECKSUM_VALUE = 'none';

/**
 * Fixity information recorded for one datastream version
 */
export type Checksum =
  | { state: 'disabled' }
  | { state: 'unrecorded'; type: ChecksumType }
  | { state: 'recorded'; type: ChecksumType; value: string };

export type ChecksumStatus = 'ok' | 'invalid' | 'missing';

/**
 * Run statistics counters
 */
export type MetricName =
  | 'objects'
  | 'ds'
  | 'ds_versions'
  | 'ok'
  | 'invalid'
  | 'missing'
  | 'ds_updated'
  | 'ds_err';
