// Domain-specific error types for the fixity auditor

/**
 * Base error class for all fixity errors
 */
export abstract class FixityError extends Error {
  abstract readonly code: string;
  abstract readonly exitCode: number;

  constructor(message: string, public readonly context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context
    };
  }
}

/**
 * Validation errors for invalid command-line input
 */
export class ValidationError extends FixityError {
  readonly code = 'VALIDATION_ERROR';
  readonly exitCode = 2;

  constructor(message: string, public readonly field?: string, context?: Record<string, unknown>) {
    super(message, { ...context, field });
  }
}

/**
 * Configuration file could not be read or does not match the schema
 */
export class ConfigError extends FixityError {
  readonly code = 'CONFIG_ERROR';
  readonly exitCode = 2;

  constructor(message: string, public readonly configPath: string) {
    super(message, { configPath });
  }
}

/**
 * Failure talking to the repository's REST API
 */
export class RepositoryError extends FixityError {
  readonly code = 'REPOSITORY_ERROR';
  readonly exitCode = 3;

  constructor(message: string, public readonly status?: number, public readonly path?: string) {
    super(message, { status, path });
  }
}

/**
 * A password is required but there is no terminal to ask on
 */
export class InteractiveError extends FixityError {
  readonly code = 'INTERACTIVE_ERROR';
  readonly exitCode = 2;

  constructor(public readonly missingFields: string[]) {
    super(
      `Interactive mode required but terminal does not support TTY input.\n` +
      `Missing required fields: ${missingFields.join(', ')}\n` +
      `Please provide these fields via command line flags or the config file.`,
      { missingFields }
    );
  }
}
