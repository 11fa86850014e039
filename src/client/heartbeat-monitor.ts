/**
 * Heartbeat Monitor
 *
 * Watches a single connection for inactivity. A periodic check compares the
 * time since the last observed activity against the keep-alive thresholds
 * and raises a warning, then a timeout, once per episode.
 */

import type { KeepAliveData } from '../shared/keep-alive-data.js';
import type { MonitoredConnection } from '../shared/connection-state.js';
import { ErrorCode, InvalidArgumentError, formatError } from '../shared/errors.js';
import { createLogger } from './logger.js';

const logger = createLogger('heartbeat');

/**
 * Zero-argument notification handler
 */
export type HeartbeatHandler = () => void;

/**
 * Monitor status derived from its flags
 */
export type HeartbeatStatus = 'healthy' | 'warned' | 'timed_out';

/**
 * Handlers to register at construction
 */
export interface HeartbeatMonitorOptions {
  onWarning?: HeartbeatHandler;
  onTimeout?: HeartbeatHandler;
}

type HeartbeatEvent = 'warning' | 'timeout';

interface MonitorState {
  keepAliveData: KeepAliveData | null;
  timedOut: boolean;
  hasBeenWarned: boolean;
  running: boolean;
  interval: NodeJS.Timeout | null;
}

/**
 * Detects silent connections and notifies on warning and timeout
 */
export class HeartbeatMonitor {
  /** Called once when inactivity first reaches the warning threshold */
  onWarning: HeartbeatHandler | undefined;
  /** Called once when inactivity first reaches the timeout threshold */
  onTimeout: HeartbeatHandler | undefined;

  private state: MonitorState = {
    keepAliveData: null,
    timedOut: false,
    hasBeenWarned: false,
    running: false,
    interval: null,
  };

  constructor(options: HeartbeatMonitorOptions = {}) {
    this.onWarning = options.onWarning;
    this.onTimeout = options.onTimeout;
  }

  /**
   * Start monitoring `connection`. Any previous run is stopped first.
   *
   * @throws InvalidArgumentError if keepAliveData is missing
   */
  start(keepAliveData: KeepAliveData | null | undefined, connection: MonitoredConnection): void {
    if (!keepAliveData) {
      throw new InvalidArgumentError('keepAliveData cannot be null');
    }

    this.stop();

    const state = this.state;

    state.keepAliveData = keepAliveData;
    state.timedOut = false;
    state.hasBeenWarned = false;
    state.running = true;
    state.interval = setInterval(() => {
      this.tick(connection);
    }, keepAliveData.checkInterval);

    logger.debug('Heartbeat monitor started', {
      checkInterval: keepAliveData.checkInterval,
      warningThreshold: keepAliveData.warningThreshold,
      timeoutThreshold: keepAliveData.timeoutThreshold,
    });
  }

  /**
   * Stop monitoring. Flags and keep-alive data are left as they are.
   */
  stop(): void {
    const state = this.state;
    if (!state.running) {
      return;
    }

    state.running = false;
    if (state.interval) {
      clearInterval(state.interval);
      state.interval = null;
    }

    logger.debug('Heartbeat monitor stopped');
  }

  /**
   * Record activity on the connection
   */
  beat(): void {
    this.state.keepAliveData?.touch();
  }

  getKeepAliveData(): KeepAliveData | null {
    return this.state.keepAliveData;
  }

  /**
   * Replace the keep-alive data without rescheduling or resetting flags
   */
  setKeepAliveData(keepAliveData: KeepAliveData | null): void {
    this.state.keepAliveData = keepAliveData;
  }

  isRunning(): boolean {
    return this.state.running;
  }

  isTimedOut(): boolean {
    return this.state.timedOut;
  }

  isWarned(): boolean {
    return this.state.hasBeenWarned;
  }

  getStatus(): HeartbeatStatus {
    if (this.state.timedOut) {
      return 'timed_out';
    }
    return this.state.hasBeenWarned ? 'warned' : 'healthy';
  }

  private tick(connection: MonitoredConnection): void {
    const event = this.evaluate(connection);
    if (event) {
      this.notify(event);
    }
  }

  /**
   * Apply one check to the monitor state and return the transition, if any.
   * Runs to completion before any handler is called.
   */
  private evaluate(connection: MonitoredConnection): HeartbeatEvent | null {
    const state = this.state;
    if (!state.running) {
      return null;
    }

    if (connection.getState() !== 'connected') {
      return null;
    }

    const keepAliveData = state.keepAliveData;
    if (!keepAliveData) {
      return null;
    }

    const elapsed = keepAliveData.getElapsed();

    if (elapsed >= keepAliveData.timeoutThreshold) {
      if (state.timedOut) {
        return null;
      }
      state.timedOut = true;
      logger.warn('Connection timed out', {
        elapsed,
        threshold: keepAliveData.timeoutThreshold,
      });
      return 'timeout';
    }

    if (elapsed >= keepAliveData.warningThreshold) {
      if (state.hasBeenWarned) {
        return null;
      }
      state.hasBeenWarned = true;
      logger.warn('Connection slow, no activity received', {
        elapsed,
        threshold: keepAliveData.warningThreshold,
      });
      return 'warning';
    }

    if (state.hasBeenWarned || state.timedOut) {
      logger.info('Connection recovered', { elapsed });
    }
    state.hasBeenWarned = false;
    state.timedOut = false;
    return null;
  }

  private notify(event: HeartbeatEvent): void {
    const handler = event === 'timeout' ? this.onTimeout : this.onWarning;
    if (!handler) {
      return;
    }

    try {
      handler();
    } catch (err) {
      const { code, message } = formatError(ErrorCode.HANDLER_FAILED, event);
      logger.error(message, {
        code,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }
}
