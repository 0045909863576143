/**
 * Error types and codes for playbook-grapher.
 * All errors raised by the library extend GrapherError.
 */

/**
 * Base error class carrying a stable error code.
 */
export class GrapherError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'GrapherError';
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
 * Configuration errors (config file, root path, output format).
 * These are the only errors that abort a run.
 */
export class ConfigError extends GrapherError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * A file could not be read or its content is not a list of records.
 */
export class ParseError extends GrapherError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ParseError';
  }
}

/**
 * A file parsed to no records.
 */
export class EmptyFileError extends GrapherError {
  constructor(filePath: string) {
    super(ErrorCodes.EMPTY_FILE, `File contains no records: ${filePath}`, { filePath });
    this.name = 'EmptyFileError';
  }
}

export const ErrorCodes = {
  // Per-file errors (recoverable)
  PARSE_ERROR: 'F001',
  READ_ERROR: 'F002',
  EMPTY_FILE: 'F003',
  NOT_A_RECORD_LIST: 'F004',
  INVALID_ROLE_REF: 'F005',
  INVALID_INCLUDE: 'F006',

  // Modeled conditions (never thrown)
  DANGLING_INCLUDE: 'D001',
  ROLE_DEPENDENCY_CYCLE: 'D002',
  DIRECTORY_LOOP: 'D003',

  // Configuration errors (fatal)
  CONFIG_LOAD_ERROR: 'C001',
  ROOT_NOT_FOUND: 'C002',
  INVALID_FORMAT: 'C003',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

const KNOWN_CODES: ReadonlySet<string> = new Set<string>(Object.values(ErrorCodes));

export function isErrorCode(code: string): code is ErrorCode {
  return KNOWN_CODES.has(code);
}
