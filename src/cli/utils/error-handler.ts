// CLI error handling utilities

import {
  FixityError,
  ValidationError,
  ConfigError,
  RepositoryError,
  InteractiveError
} from '../../core/errors.js';

/**
 * Format an error for CLI output
 */
export function formatError(error: unknown): string {
  if (error instanceof ValidationError) {
    const field = error.field ? ` (field: ${error.field})` : '';
    return `Validation Error${field}: ${error.message}`;
  }

  if (error instanceof ConfigError) {
    return `Config Error (${error.configPath}): ${error.message}`;
  }

  if (error instanceof RepositoryError) {
    return `Repository Error: ${error.message}`;
  }

  if (error instanceof InteractiveError) {
    return error.message;
  }

  if (error instanceof FixityError) {
    return `Error [${error.code}]: ${error.message}`;
  }

  if (error instanceof Error) {
    return `Error: ${error.message}`;
  }

  return `Unknown error: ${String(error)}`;
}

/**
 * Exit code for an error: the domain error's own code, otherwise 1
 */
export function exitCodeFor(error: unknown): number {
  return error instanceof FixityError ? error.exitCode : 1;
}

/**
 * Handle CLI errors with proper exit codes
 */
export function handleError(error: unknown): never {
  console.error(`\n${formatError(error)}\n`);
  process.exit(exitCodeFor(error));
}

/**
 * Wrap an async CLI action with error handling
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    try {
      await fn(...args);
    } catch (error) {
      handleError(error);
    }
  };
}
