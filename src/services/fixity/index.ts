/**
 * Fixity Module
 *
 * Checksum classification, repair and the object traversal that drives them.
 *
 * @module services/fixity
 */

export * from './run-stats.js';
export * from './checksum.js';
export * from './checksum-classifier.js';
export * from './repair-decider.js';
export * from './interrupt-coordinator.js';
export * from './object-walker.js';
