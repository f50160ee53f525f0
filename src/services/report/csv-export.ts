// CSV export of checksum findings

import * as fs from 'fs/promises';
import * as path from 'path';
import { ValidationError } from '../../core/errors.js';
import type { ReportRow } from '../../models/datastream.js';

export const CSV_HEADER = ['pid', 'datastream id', 'date created', 'status', 'mimetype', 'versioned'] as const;

const LINE_ENDING = '\r\n';

/**
 * Quotes every field, doubling embedded quotes
 */
function quote(field: string): string {
  return `"${field.replace(/"/g, '""')}"`;
}

function toFields(row: ReportRow): string[] {
  return [
    row.pid,
    row.dsid,
    row.createdAt.toISOString(),
    row.status,
    row.mimetype,
    String(row.versionable)
  ];
}

/**
 * Renders the header and one line per row
 */
export function formatCsv(rows: readonly ReportRow[]): string {
  const lines = [[...CSV_HEADER], ...rows.map(toFields)]
    .map(fields => fields.map(quote).join(','));
  return lines.join(LINE_ENDING) + LINE_ENDING;
}

/**
 * Fails before any work is done when the report could not be written:
 * the directory must exist and be writable, and the path must not be a directory.
 */
export async function assertCsvWritable(filePath: string): Promise<void> {
  const directory = path.dirname(path.resolve(filePath));
  try {
    await fs.access(directory, fs.constants.W_OK);
  } catch {
    throw new ValidationError(
      `Cannot write CSV file ${filePath}: directory ${directory} does not exist or is not writable`,
      'csv-file'
    );
  }

  try {
    if ((await fs.stat(filePath)).isDirectory()) {
      throw new ValidationError(`Cannot write CSV file ${filePath}: it is a directory`, 'csv-file');
    }
  } catch (error) {
    if (error instanceof ValidationError) throw error;
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return;
    const message = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`Cannot write CSV file ${filePath}: ${message}`, 'csv-file');
  }
}

export async function writeCsvReport(filePath: string, rows: readonly ReportRow[]): Promise<void> {
  await fs.writeFile(filePath, formatCsv(rows), 'utf-8');
}
