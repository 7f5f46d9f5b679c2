/**
 * Error types and codes for devshell.
 * Every error raised by the evaluator extends DevshellError.
 */

/**
 * Base error class for all devshell errors.
 */
export class DevshellError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'DevshellError';
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
 * Tool configuration errors (.devshell/config.yaml).
 */
export class ConfigError extends DevshellError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * Descriptor errors (devshell.yaml shape and internal references).
 */
export class DescriptorError extends DevshellError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'DescriptorError';
  }
}

/**
 * Source registry errors.
 */
export class RegistryError extends DevshellError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'RegistryError';
  }
}

/**
 * Errors surfaced from package resolution: sources, revisions, packages.
 */
export class ResolutionError extends DevshellError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ResolutionError';
  }
}

/**
 * System errors (file not found, parse errors, etc.).
 */
export class SystemError extends DevshellError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

export const ErrorCodes = {
  // Configuration errors
  CONFIG_LOAD_ERROR: 'C001',

  // Descriptor errors (D001-D004)
  INVALID_DESCRIPTOR: 'D001',
  UNKNOWN_INPUT: 'D002',
  DUPLICATE_PLATFORM: 'D003',
  VARIABLE_CONFLICT: 'D004',

  // Registry errors (R001-R003)
  DUPLICATE_SOURCE: 'R001',
  UNKNOWN_SOURCE: 'R002',
  CIRCULAR_FOLLOWS: 'R003',

  // Resolution errors (X001-X005)
  UNRESOLVABLE_SOURCE: 'X001',
  REVISION_MISMATCH: 'X002',
  UNDEFINED_PACKAGE: 'X003',
  INVALID_ATTR_PATH: 'X004',
  INVALID_LOCATOR: 'X005',

  // System errors (S001-S002)
  PARSE_ERROR: 'S001',
  INVALID_FILE: 'S002',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Message of an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
