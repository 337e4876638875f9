/**
 * Error types and codes for argcheck.
 *
 * Schema findings are diagnostics, never errors. These classes cover the
 * failures around the analysis: configuration, file access and parsing.
 */

/**
 * Base error class for all argcheck errors.
 */
export class ArgCheckError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ArgCheckError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Configuration-related errors (loading, parsing, validation).
 */
export class ConfigError extends ArgCheckError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * System errors (file not found, parse errors, etc.).
 */
export class SystemError extends ArgCheckError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

export const ErrorCodes = {
  // Configuration errors (C001-C002)
  CONFIG_LOAD_ERROR: 'C001',
  CONFIG_INVALID: 'C002',

  // System errors (S001-S003)
  PARSE_ERROR: 'S001',
  FILE_NOT_FOUND: 'S002',
  SOURCE_LOAD_ERROR: 'S003',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Exit codes used by the CLI.
 */
export const ExitCodes = {
  SUCCESS: 0,
  FINDINGS: 1,
  FAILURE: 2,
} as const;
