/**
 * Error types and codes for codesim.
 * Every error raised on purpose extends CodeSimError.
 */

/**
 * Base error class for all codesim errors.
 */
export class CodeSimError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'CodeSimError';
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
 * Configuration errors (loading, parsing, validation).
 * Raised before any comparison runs.
 */
export class ConfigError extends CodeSimError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * Rejected input documents. The engine refuses to normalize these.
 */
export class InputError extends CodeSimError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'InputError';
  }
}

/**
 * System errors (file access, parse errors).
 */
export class SystemError extends CodeSimError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

export const ErrorCodes = {
  // Configuration
  INVALID_CONFIG: 'INVALID_CONFIG',
  CONFIG_LOAD_ERROR: 'CONFIG_LOAD_ERROR',

  // Input
  ENCODING_ERROR: 'ENCODING_ERROR',

  // System
  PARSE_ERROR: 'PARSE_ERROR',
  FILE_READ_ERROR: 'FILE_READ_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
