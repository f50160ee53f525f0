/**
 * Prompt Service Module
 *
 * Interactive password prompt.
 *
 * @module services/prompt
 */

export * from './prompt-service.js';
