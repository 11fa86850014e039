/**
 * Structured Logger
 *
 * Console logging with ISO 8601 timestamps, an optional component scope and
 * JSON-formatted context.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  [key: string]: unknown;
}

/**
 * Logger bound to a component scope
 */
export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

let verbose = false;

/**
 * Set verbose mode (enables debug output)
 */
export function setVerbose(enabled: boolean): void {
  verbose = enabled;
}

export function isVerbose(): boolean {
  return verbose;
}

/**
 * Format a log line: `[timestamp] [LEVEL] [scope] message {context}`
 */
export function formatLog(
  level: LogLevel,
  message: string,
  context?: LogContext,
  scope?: string
): string {
  const timestamp = new Date().toISOString();
  const levelStr = level.toUpperCase().padEnd(5);
  const prefix = scope
    ? `[${timestamp}] [${levelStr}] [${scope}]`
    : `[${timestamp}] [${levelStr}]`;

  if (context && Object.keys(context).length > 0) {
    return `${prefix} ${message} ${JSON.stringify(context)}`;
  }

  return `${prefix} ${message}`;
}

/**
 * Log a message at the specified level
 */
export function log(level: LogLevel, message: string, context?: LogContext, scope?: string): void {
  if (level === 'debug' && !verbose) {
    return;
  }

  const formatted = formatLog(level, message, context, scope);

  switch (level) {
    case 'error':
      console.error(formatted);
      break;
    case 'warn':
      console.warn(formatted);
      break;
    default:
      console.log(formatted);
  }
}

/**
 * Create a logger whose lines are tagged with `scope`
 */
export function createLogger(scope: string): Logger {
  return {
    debug: (message, context) => log('debug', message, context, scope),
    info: (message, context) => log('info', message, context, scope),
    warn: (message, context) => log('warn', message, context, scope),
    error: (message, context) => log('error', message, context, scope),
  };
}
