/**
 * Fedora REST response parsing
 *
 * Converts the XML documents of the Fedora 3 REST API (and the CSV output of
 * the Resource Index) into the auditor's models.
 */

import { XMLParser } from 'fast-xml-parser';
import { z } from 'zod';
import { RepositoryError } from '../../core/errors.js';
import {
  DatastreamListingSchema,
  DatastreamProfileSchema,
  type DatastreamProfile
} from '../../core/schemas.js';
import type { DatastreamRecord } from '../../models/datastream.js';
import { parseChecksum } from '../fixity/checksum.js';

const FEDORA_URI_PREFIX = 'info:fedora/';

/**
 * Paths that hold repeated elements; a single child must still parse as an array
 */
const ARRAY_PATHS = new Set([
  'objectDatastreams.datastream',
  'datastreamHistory.datastreamProfile'
]);

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '',
  removeNSPrefix: true,
  ignoreDeclaration: true,
  // Checksums and dates must stay strings
  parseTagValue: false,
  parseAttributeValue: false,
  isArray: (_tagName: string, jPath: string) => ARRAY_PATHS.has(jPath)
});

const emptyElementAsObject = (value: unknown) => (value === '' ? {} : value);

const ProfileDocumentSchema = z.object({
  datastreamProfile: DatastreamProfileSchema
});

const HistoryDocumentSchema = z.object({
  datastreamHistory: z.preprocess(emptyElementAsObject, z.object({
    datastreamProfile: z.array(DatastreamProfileSchema).default([])
  }).passthrough())
});

const ListingDocumentSchema = z.object({
  objectDatastreams: z.preprocess(emptyElementAsObject, z.object({
    datastream: z.array(DatastreamListingSchema).default([])
  }).passthrough())
});

function parseDocument<T>(xml: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, what: string): T {
  let parsed: unknown;
  try {
    parsed = parser.parse(xml);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new RepositoryError(`Malformed ${what} XML: ${message}`);
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.errors
      .map(err => `${err.path.join('.') || '(root)'}: ${err.message}`)
      .join('; ');
    throw new RepositoryError(`Unexpected ${what} response: ${issues}`);
  }
  return result.data;
}

export function parseDatastreamProfile(xml: string): DatastreamProfile {
  return parseDocument(xml, ProfileDocumentSchema, 'datastream profile').datastreamProfile;
}

export function parseDatastreamHistory(xml: string): DatastreamProfile[] {
  return parseDocument(xml, HistoryDocumentSchema, 'datastream history').datastreamHistory.datastreamProfile;
}

export function parseDatastreamListing(xml: string): string[] {
  return parseDocument(xml, ListingDocumentSchema, 'datastream listing').objectDatastreams.datastream
    .map(entry => entry.dsid);
}

/**
 * Builds a record from a profile; dates and flags are validated here
 */
export function profileToRecord(pid: string, dsid: string, profile: DatastreamProfile): DatastreamRecord {
  const createdAt = new Date(profile.dsCreateDate);
  if (Number.isNaN(createdAt.getTime())) {
    throw new RepositoryError(`Invalid creation date "${profile.dsCreateDate}" for ${pid}/${dsid}`);
  }

  return {
    pid,
    dsid,
    checksum: parseChecksum(profile.dsChecksumType, profile.dsChecksum),
    mimetype: profile.dsMIME,
    versionable: profile.dsVersionable.trim().toLowerCase() === 'true',
    createdAt
  };
}

/**
 * Reads `dsChecksumValid` from a profile requested with validateChecksum=true
 */
export function readChecksumValid(pid: string, dsid: string, profile: DatastreamProfile): boolean {
  const flag = profile.dsChecksumValid?.trim().toLowerCase();
  if (flag === 'true') return true;
  if (flag === 'false') return false;
  throw new RepositoryError(`Repository did not report checksum validity for ${pid}/${dsid}`);
}

/**
 * Extracts PIDs from a single-column Resource Index CSV result
 */
export function parseRiSearchPids(csv: string): string[] {
  return csv
    .split(/\r?\n/)
    .slice(1)
    .map(line => line.trim().replace(/^"|"$/g, ''))
    .filter(line => line.length > 0)
    .map(value => (value.startsWith(FEDORA_URI_PREFIX) ? value.slice(FEDORA_URI_PREFIX.length) : value));
}
