// Public API of the fixity auditor

export * from './models/index.js';
export * from './core/errors.js';
export * from './core/logger.js';
export * from './services/fixity/index.js';
export * from './services/report/index.js';
export * from './services/fedora/index.js';
export * from './services/config/index.js';
export * from './services/progress/index.js';
