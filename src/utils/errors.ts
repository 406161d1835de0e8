/**
 * Error types and codes for doctag.
 * All errors raised by the library extend DocTagError.
 */

/**
 * Base error class for all doctag errors.
 */
export class DocTagError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'DocTagError';
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
 * Configuration file errors (loading, parsing, schema).
 */
export class ConfigError extends DocTagError {
  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * Model definition errors: malformed tags, duplicate store names,
 * missing nested models, records that do not match their model.
 * Error codes: M001-M004
 */
export class ModelError extends DocTagError {
  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ModelError';
  }
}

/**
 * Rule configuration errors. These abort the whole engine call.
 * Error codes: R001-R005
 */
export class RuleError extends DocTagError {
  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'RuleError';
  }
}

/**
 * Data validation errors.
 * Error codes: V001
 */
export class ValidationError extends DocTagError {
  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ValidationError';
  }
}

/**
 * System errors (file not found, parse errors, etc.).
 * Error codes: S001-S004
 */
export class SystemError extends DocTagError {
  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

/**
 * Raised when the execution signal is aborted mid-call.
 */
export class CancelledError extends DocTagError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.CANCELLED, message, details);
    this.name = 'CancelledError';
  }
}

export const ErrorCodes = {
  // Validation errors
  VALIDATION_FAILED: 'V001',

  // Rule errors (R001-R005)
  UNKNOWN_VALIDATION: 'R001',
  UNKNOWN_TRANSFORMATION: 'R002',
  INVALID_RULE_PARAM: 'R003',
  VALIDATION_RULE_FAILED: 'R004',
  TRANSFORMATION_FAILED: 'R005',

  // Model errors (M001-M004)
  INVALID_TAG: 'M001',
  DUPLICATE_FIELD: 'M002',
  UNKNOWN_MODEL: 'M003',
  RECORD_SHAPE_MISMATCH: 'M004',

  // System errors (S001-S004)
  PARSE_ERROR: 'S001',
  CANCELLED: 'S002',
  FILE_NOT_FOUND: 'S003',
  CONFIG_LOAD_ERROR: 'S004',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
