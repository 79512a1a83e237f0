/**
 * INI Store - Error Handling
 * @module utils/errors
 *
 * IniStoreError hierarchy for consistent error handling.
 *
 * Contract violations are thrown. Operational failures (unreadable file,
 * failed commit) are built as errors, logged, and reported through return
 * values and `IniFile.lastError`.
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * All ini-store error codes
 */
export const ErrorCodes = {
  // Caller errors
  INVALID_ARGUMENT: 'INVALID_ARGUMENT',
  HANDLE_CLOSED: 'HANDLE_CLOSED',

  // File errors
  READ_FAILED: 'READ_FAILED',
  WRITE_FAILED: 'WRITE_FAILED',

  // Configuration errors
  CONFIG_INVALID: 'CONFIG_INVALID',

  // System errors
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// =============================================================================
// Error Solutions
// =============================================================================

const errorSolutions: Record<ErrorCode, string> = {
  INVALID_ARGUMENT: 'Check the section, key and value passed to the store.',
  HANDLE_CLOSED: 'Open a new IniFile; a closed handle cannot be reused.',
  READ_FAILED: 'Verify the file exists and is readable.',
  WRITE_FAILED:
    'Check that the directory is writable. The original file was left untouched.',
  CONFIG_INVALID: 'Fix the reported fields in .inistorerc.json.',
  INTERNAL_ERROR: 'An unexpected error occurred. Please report this issue.',
};

// =============================================================================
// Base Error
// =============================================================================

interface IniErrorOptions {
  userMessage?: string;
  technical?: unknown;
  cause?: Error;
}

/**
 * Base error class for all ini-store errors
 */
export class IniStoreError extends Error {
  /** Error code for programmatic handling */
  readonly code: ErrorCode;
  /** User-friendly error message */
  readonly userMessage: string;
  /** Technical details for debugging */
  readonly technical?: unknown;

  constructor(code: ErrorCode, message: string, options?: IniErrorOptions) {
    super(message);
    this.name = 'IniStoreError';
    this.code = code;
    this.userMessage =
      options?.userMessage || `${message}\n\nFix: ${errorSolutions[code]}`;
    this.technical = options?.technical;

    if (options?.cause) {
      this.cause = options.cause;
    }

    Error.captureStackTrace?.(this, this.constructor);
  }

  /**
   * Format error for CLI display
   */
  toCliOutput(symbol = true): string {
    const prefix = symbol ? '✗' : '[ERR]';
    return `${prefix} ${this.message}\n\n${this.userMessage}`;
  }

  /**
   * Format error for JSON output and structured logs
   */
  toJSON(): {
    code: string;
    message: string;
    userMessage: string;
    technical?: unknown;
  } {
    return {
      code: this.code,
      message: this.message,
      userMessage: this.userMessage,
      ...(this.technical ? { technical: this.technical } : {}),
    };
  }
}

// =============================================================================
// Specialized Error Classes
// =============================================================================

/**
 * Caller bugs: bad arguments or use of a closed handle
 */
export class ContractViolationError extends IniStoreError {
  constructor(
    code: Extract<ErrorCode, 'INVALID_ARGUMENT' | 'HANDLE_CLOSED'>,
    message: string,
    options?: IniErrorOptions
  ) {
    super(code, message, options);
    this.name = 'ContractViolationError';
  }
}

/**
 * File system failures while scanning or committing
 */
export class StoreIOError extends IniStoreError {
  /** Path that caused the error */
  readonly path?: string;

  constructor(
    code: Extract<ErrorCode, 'READ_FAILED' | 'WRITE_FAILED'>,
    message: string,
    options?: IniErrorOptions & { path?: string }
  ) {
    super(code, message, options);
    this.name = 'StoreIOError';
    this.path = options?.path;
  }
}

/**
 * Malformed or invalid configuration
 */
export class ConfigError extends IniStoreError {
  /** Individual validation messages */
  readonly errors: string[];

  constructor(message: string, options?: IniErrorOptions & { errors?: string[] }) {
    super('CONFIG_INVALID', message, options);
    this.name = 'ConfigError';
    this.errors = options?.errors ?? [];
  }
}

// =============================================================================
// Error Helpers
// =============================================================================

/**
 * Check if an error is an ini-store error
 */
export function isIniStoreError(error: unknown): error is IniStoreError {
  return error instanceof IniStoreError;
}

/**
 * Wrap an unknown error as an ini-store error
 */
export function wrapError(error: unknown, context?: string): IniStoreError {
  if (isIniStoreError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);

  return new IniStoreError(
    'INTERNAL_ERROR',
    context ? `${context}: ${message}` : message,
    {
      cause: error instanceof Error ? error : undefined,
      technical: error,
    }
  );
}

/**
 * Throw an INVALID_ARGUMENT contract violation unless `condition` holds
 */
export function requireArgument(condition: boolean, message: string): asserts condition {
  if (!condition) {
    throw new ContractViolationError('INVALID_ARGUMENT', message);
  }
}
