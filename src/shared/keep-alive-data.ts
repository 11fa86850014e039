/**
 * Keep-Alive Data
 *
 * Timing thresholds for a monitored connection together with the timestamp
 * of the last observed activity. Thresholds are validated with Zod.
 */

import { z } from 'zod';
import { ErrorCode, InvalidArgumentError } from './errors.js';

/**
 * Longest delay a Node.js timer accepts; larger values fire after 1ms
 */
export const MAX_CHECK_INTERVAL = 2 ** 31 - 1;

/**
 * Threshold schema: 0 < warningThreshold < timeoutThreshold,
 * 0 < checkInterval <= MAX_CHECK_INTERVAL
 */
export const KeepAliveConfigSchema = z
  .object({
    checkInterval: z.number().finite().positive().max(MAX_CHECK_INTERVAL),
    warningThreshold: z.number().finite().positive(),
    timeoutThreshold: z.number().finite().positive(),
  })
  .refine((config) => config.warningThreshold < config.timeoutThreshold, {
    message: 'warningThreshold must be less than timeoutThreshold',
    path: ['warningThreshold'],
  });
export type KeepAliveConfig = z.infer<typeof KeepAliveConfigSchema>;

/**
 * Derive thresholds from a single keep-alive timeout.
 *
 * The warning fires after two thirds of the timeout, and the remaining third
 * is sampled three times.
 */
export function deriveKeepAliveConfig(
  timeout: number,
  overrides?: Partial<Pick<KeepAliveConfig, 'checkInterval' | 'warningThreshold'>>
): KeepAliveConfig {
  const warningThreshold = overrides?.warningThreshold ?? Math.floor((timeout * 2) / 3);
  const checkInterval =
    overrides?.checkInterval ?? Math.floor((timeout - warningThreshold) / 3);

  return { checkInterval, warningThreshold, timeoutThreshold: timeout };
}

/**
 * Keep-alive timings and last activity for one connection
 */
export class KeepAliveData {
  /** Timestamp (ms) of the most recent activity */
  lastActivity: number;
  readonly checkInterval: number;
  readonly warningThreshold: number;
  readonly timeoutThreshold: number;

  constructor(config: KeepAliveConfig, lastActivity: number = Date.now()) {
    const result = KeepAliveConfigSchema.safeParse(config);
    if (!result.success) {
      const details = result.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new InvalidArgumentError(details, ErrorCode.INVALID_KEEP_ALIVE);
    }

    this.checkInterval = result.data.checkInterval;
    this.warningThreshold = result.data.warningThreshold;
    this.timeoutThreshold = result.data.timeoutThreshold;
    this.lastActivity = lastActivity;
  }

  /**
   * Create keep-alive data from a single timeout (ms)
   */
  static fromTimeout(timeout: number): KeepAliveData {
    return new KeepAliveData(deriveKeepAliveConfig(timeout));
  }

  /**
   * Record activity
   */
  touch(now: number = Date.now()): void {
    this.lastActivity = now;
  }

  /**
   * Milliseconds since the last activity
   */
  getElapsed(now: number = Date.now()): number {
    return now - this.lastActivity;
  }

  toConfig(): KeepAliveConfig {
    return {
      checkInterval: this.checkInterval,
      warningThreshold: this.warningThreshold,
      timeoutThreshold: this.timeoutThreshold,
    };
  }
}
