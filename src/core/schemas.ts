// Zod schemas for configuration and repository responses

import { z } from 'zod';
import { CHECKSUM_TYPES } from '../models/types.js';

/**
 * Checksum type accepted as a repair override
 */
export const ChecksumTypeSchema = z.enum(CHECKSUM_TYPES);

/**
 * Fedora content model whose members are audited when no PIDs are given
 */
export const DEFAULT_MODEL_URI = 'info:fedora/fedora-system:FedoraObject-3.0';

export const DEFAULT_REPAIR_MESSAGE = 'updating missing checksum';

/**
 * Repository connection section
 */
export const FedoraConfigSchema = z.object({
  root: z.string().url('Repository root must be a URL').optional(),
  user: z.string().min(1).optional(),
  password: z.string().optional(),
  timeoutMs: z.number().int().positive().optional()
}).strict();

/**
 * Full configuration file schema
 */
export const FixityConfigSchema = z.object({
  fedora: FedoraConfigSchema.optional(),
  discovery: z.object({
    modelUri: z.string().min(1).optional()
  }).strict().optional(),
  repair: z.object({
    checksumType: ChecksumTypeSchema.optional(),
    logMessage: z.string().min(1).optional()
  }).strict().optional()
}).strict();

export type FixityConfig = z.infer<typeof FixityConfigSchema>;

/**
 * Fields of a Fedora `datastreamProfile` document used by the auditor.
 * Values arrive as strings; elements Fedora omits are optional.
 */
export const DatastreamProfileSchema = z.object({
  dsCreateDate: z.string().min(1),
  dsMIME: z.string().default(''),
  dsVersionable: z.string().default('false'),
  dsChecksumType: z.string().default('DISABLED'),
  dsChecksum: z.string().default(''),
  dsChecksumValid: z.string().optional()
}).passthrough();

export type DatastreamProfile = z.infer<typeof DatastreamProfileSchema>;

/**
 * `objectDatastreams` listing entry
 */
export const DatastreamListingSchema = z.object({
  dsid: z.string().min(1)
}).passthrough();

/**
 * Validates a config object and returns all validation errors
 */
export function validateConfig(data: unknown): { success: true; data: FixityConfig } | { success: false; errors: string[] } {
  const result = FixityConfigSchema.safeParse(data);

  if (result.success) {
    return { success: true, data: result.data };
  }

  const errors = result.error.errors.map(err => {
    const path = err.path.join('.');
    return path ? `${path}: ${err.message}` : err.message;
  });

  return { success: false, errors };
}
