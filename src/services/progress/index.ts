export * from './progress-indicator.js';
