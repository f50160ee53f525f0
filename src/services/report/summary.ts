// Final run summaries

import type { RunStats } from '../fixity/run-stats.js';

export interface ValidateSummaryOptions {
  allVersions: boolean;
  missingOnly: boolean;
}

export function renderValidateSummary(stats: RunStats, options: ValidateSummaryOptions): string[] {
  let totals = `Tested ${stats.get('objects')} object(s), ${stats.get('ds')} datastream(s)`;
  if (options.allVersions) {
    totals += `, ${stats.get('ds_versions')} datastream version(s)`;
  }

  const lines = [totals];
  if (!options.missingOnly) {
    lines.push(`${stats.get('invalid')} invalid checksum(s)`);
  }
  lines.push(`${stats.get('missing')} datastream(s) with missing checksum`);

  if (stats.get('ds_err') > 0) {
    lines.push(`Error checking ${stats.get('ds_err')} datastream(s)`);
  }

  return lines;
}

export function renderRepairSummary(stats: RunStats): string[] {
  const lines = [
    `Checked ${stats.get('objects')} object(s), updated ${stats.get('ds_updated')} datastream(s)`
  ];

  if (stats.get('ds_err') > 0) {
    lines.push(`Error saving ${stats.get('ds_err')} datastream(s)`);
  }

  return lines;
}
