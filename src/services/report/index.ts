/**
 * Report Module
 *
 * Status lines, CSV export and run summaries.
 *
 * @module services/report
 */

export * from './report-writer.js';
export * from './csv-export.js';
export * from './summary.js';
