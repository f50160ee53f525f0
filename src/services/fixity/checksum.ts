// Conversion between wire checksum fields and the tagged Checksum state

import { RepositoryError } from '../../core/errors.js';
import {
  CHECKSUM_TYPES,
  DISABLED_CHECKSUM_TYPE,
  NO_CHECKSUM_VALUE,
  type Checksum
} from '../../models/types.js';

/**
 * Builds the tagged checksum state from a repository's type and value strings
 */
export function parseChecksum(type: string, value: string): Checksum {
  const normalizedType = type.trim().toUpperCase();
  if (normalizedType === DISABLED_CHECKSUM_TYPE) {
    return { state: 'disabled' };
  }

  const known = CHECKSUM_TYPES.find(candidate => candidate === normalizedType);
  if (!known) {
    throw new RepositoryError(`Unrecognised checksum type "${type}"`);
  }

  const trimmedValue = value.trim();
  if (trimmedValue === '' || trimmedValue === NO_CHECKSUM_VALUE) {
    return { state: 'unrecorded', type: known };
  }

  return { state: 'recorded', type: known, value: trimmedValue };
}

/**
 * True when no fixity information is recorded (disabled type or `none` value)
 */
export function lacksFixity(checksum: Checksum): boolean {
  switch (checksum.state) {
    case 'disabled':
    case 'unrecorded':
      return true;
    case 'recorded':
      return false;
  }
}

/**
 * Wire form of the checksum type, for display
 */
export function describeChecksum(checksum: Checksum): string {
  switch (checksum.state) {
    case 'disabled':
      return DISABLED_CHECKSUM_TYPE;
    case 'unrecorded':
      return `${checksum.type}:${NO_CHECKSUM_VALUE}`;
    case 'recorded':
      return `${checksum.type}:${checksum.value}`;
  }
}
