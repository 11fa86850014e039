/**
 * Client Configuration
 *
 * Command line flags with environment variable fallbacks, validated with Zod.
 */

import { z } from 'zod';
import { ErrorCode, InvalidArgumentError } from '../shared/errors.js';
import { KeepAliveData, deriveKeepAliveConfig } from '../shared/keep-alive-data.js';

/**
 * Default keep-alive timeout (ms)
 */
export const DEFAULT_TIMEOUT = 20000;

export const ClientConfigSchema = z.object({
  url: z.string().url(),
  timeout: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT),
  warning: z.coerce.number().int().positive().optional(),
  interval: z.coerce.number().int().positive().optional(),
  verbose: z.boolean().default(false),
});
export type ClientConfig = z.infer<typeof ClientConfigSchema>;

export type ParsedArgs = { help: true } | { help: false; config: ClientConfig };

export const HELP_TEXT = `
keepalive-monitor - Watch a WebSocket connection for silent failure

Usage: keepalive-monitor --url <ws-url> [options]

Options:
  -u, --url <url>         WebSocket URL to connect to (env: HEARTBEAT_URL)
  -t, --timeout <ms>      Inactivity timeout (default: ${DEFAULT_TIMEOUT}, env: HEARTBEAT_TIMEOUT_MS)
  -w, --warning <ms>      Inactivity warning threshold (env: HEARTBEAT_WARNING_MS)
  -i, --interval <ms>     Check interval (env: HEARTBEAT_INTERVAL_MS)
  -v, --verbose           Enable verbose logging (env: HEARTBEAT_VERBOSE=1)
  -h, --help              Show this help message
`;

/**
 * Read an environment variable, treating an empty value as unset
 */
function fromEnv(value: string | undefined): string | undefined {
  return value === '' ? undefined : value;
}

/**
 * Parse command line arguments on top of environment defaults
 *
 * @throws InvalidArgumentError with INVALID_CONFIG when validation fails
 */
export function parseArgs(args: string[], env: NodeJS.ProcessEnv = {}): ParsedArgs {
  const raw: Record<string, string | boolean | undefined> = {
    url: fromEnv(env.HEARTBEAT_URL),
    timeout: fromEnv(env.HEARTBEAT_TIMEOUT_MS),
    warning: fromEnv(env.HEARTBEAT_WARNING_MS),
    interval: fromEnv(env.HEARTBEAT_INTERVAL_MS),
    verbose: env.HEARTBEAT_VERBOSE === '1',
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1];

    switch (arg) {
      case '--url':
      case '-u':
        raw.url = next;
        i++;
        break;

      case '--timeout':
      case '-t':
        raw.timeout = next;
        i++;
        break;

      case '--warning':
      case '-w':
        raw.warning = next;
        i++;
        break;

      case '--interval':
      case '-i':
        raw.interval = next;
        i++;
        break;

      case '--verbose':
      case '-v':
        raw.verbose = true;
        break;

      case '--help':
      case '-h':
        return { help: true };

      default:
        throw new InvalidArgumentError(`unknown option ${arg}`, ErrorCode.INVALID_CONFIG);
    }
  }

  const result = ClientConfigSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new InvalidArgumentError(details, ErrorCode.INVALID_CONFIG);
  }

  return { help: false, config: result.data };
}

/**
 * Build keep-alive data, deriving omitted thresholds from the timeout
 */
export function toKeepAliveData(config: ClientConfig): KeepAliveData {
  return new KeepAliveData(
    deriveKeepAliveConfig(config.timeout, {
      warningThreshold: config.warning,
      checkInterval: config.interval,
    })
  );
}
