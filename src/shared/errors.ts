/**
 * Keep-Alive Monitor Error Codes
 *
 * Numeric error codes organized by category.
 * - 1xxx: Argument errors
 * - 2xxx: Connection errors
 * - 3xxx: Handler errors
 * - 5xxx: Internal errors
 */

/**
 * Monitor error codes
 */
export enum ErrorCode {
  // Argument errors (1xxx)
  /** A required argument was missing or invalid */
  INVALID_ARGUMENT = 1001,
  /** Keep-alive thresholds violate 0 < warning < timeout */
  INVALID_KEEP_ALIVE = 1002,
  /** Client configuration failed validation */
  INVALID_CONFIG = 1003,

  // Connection errors (2xxx)
  /** No activity received within the timeout threshold */
  CONNECTION_TIMEOUT = 2001,
  /** Underlying socket reported an error */
  CONNECTION_FAILED = 2002,

  // Handler errors (3xxx)
  /** A warning or timeout handler threw */
  HANDLER_FAILED = 3001,

  // Internal errors (5xxx)
  /** Unexpected internal error */
  INTERNAL_ERROR = 5001,
}

/**
 * Error code category
 */
export type ErrorCategory = 'argument' | 'connection' | 'handler' | 'internal';

/**
 * Get the category of an error code
 */
export function getErrorCategory(code: ErrorCode): ErrorCategory {
  switch (Math.floor(code / 1000)) {
    case 1:
      return 'argument';
    case 2:
      return 'connection';
    case 3:
      return 'handler';
    default:
      return 'internal';
  }
}

/**
 * Human-readable error messages for each error code
 */
export const ERROR_MESSAGES: Record<ErrorCode, string> = {
  [ErrorCode.INVALID_ARGUMENT]: 'Invalid argument',
  [ErrorCode.INVALID_KEEP_ALIVE]: 'Invalid keep-alive thresholds',
  [ErrorCode.INVALID_CONFIG]: 'Invalid configuration',
  [ErrorCode.CONNECTION_TIMEOUT]: 'Connection timed out',
  [ErrorCode.CONNECTION_FAILED]: 'Connection failed',
  [ErrorCode.HANDLER_FAILED]: 'Heartbeat handler failed',
  [ErrorCode.INTERNAL_ERROR]: 'Internal error',
};

/**
 * Get the human-readable message for an error code
 */
export function getErrorMessage(code: ErrorCode): string {
  return ERROR_MESSAGES[code] ?? `Unknown error (${code})`;
}

/**
 * Format an error with code and message
 */
export function formatError(
  code: ErrorCode,
  details?: string
): { code: ErrorCode; message: string } {
  const baseMessage = getErrorMessage(code);
  const message = details ? `${baseMessage}: ${details}` : baseMessage;
  return { code, message };
}

/**
 * Base error carrying a monitor error code
 */
export class MonitorError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, details?: string) {
    super(formatError(code, details).message);
    this.name = 'MonitorError';
    this.code = code;
  }

  get category(): ErrorCategory {
    return getErrorCategory(this.code);
  }
}

/**
 * Raised synchronously when a caller violates an argument contract
 */
export class InvalidArgumentError extends MonitorError {
  constructor(details: string, code: ErrorCode = ErrorCode.INVALID_ARGUMENT) {
    super(code, details);
    this.name = 'InvalidArgumentError';
  }
}

/**
 * Check if a value is a MonitorError
 */
export function isMonitorError(value: unknown): value is MonitorError {
  return value instanceof MonitorError;
}

/**
 * Wrap an unknown thrown value, keeping MonitorErrors as they are
 */
export function toMonitorError(value: unknown): MonitorError {
  if (isMonitorError(value)) {
    return value;
  }
  return new MonitorError(
    ErrorCode.INTERNAL_ERROR,
    value instanceof Error ? value.message : String(value)
  );
}
