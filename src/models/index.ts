// Export all domain models

export * from './types.js';
export * from './datastream.js';
export * from './repository.js';
