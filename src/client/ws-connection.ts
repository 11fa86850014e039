/**
 * WebSocket Connection Adapter
 *
 * Exposes a `ws` client socket as a monitored connection and feeds its
 * traffic into a heartbeat monitor.
 */

import { WebSocket } from 'ws';
import type { ConnectionState, MonitoredConnection } from '../shared/connection-state.js';
import type { HeartbeatMonitor } from './heartbeat-monitor.js';
import { createLogger } from './logger.js';

const logger = createLogger('ws');

/**
 * Events that count as activity on the socket
 */
export const ACTIVITY_EVENTS = ['message', 'ping', 'pong'] as const;

export class WebSocketConnection implements MonitoredConnection {
  constructor(private readonly ws: WebSocket) {}

  getState(): ConnectionState {
    switch (this.ws.readyState) {
      case WebSocket.CONNECTING:
        return 'connecting';
      case WebSocket.OPEN:
        return 'connected';
      default:
        return 'disconnected';
    }
  }

  /**
   * Beat the monitor on socket activity and stop it when the socket closes.
   * Returns a function that removes the listeners again.
   */
  attach(monitor: HeartbeatMonitor): () => void {
    const onActivity = (): void => {
      monitor.beat();
    };
    const onClose = (): void => {
      logger.debug('Socket closed, stopping heartbeat monitor');
      monitor.stop();
    };

    for (const event of ACTIVITY_EVENTS) {
      this.ws.on(event, onActivity);
    }
    this.ws.on('close', onClose);

    return () => {
      for (const event of ACTIVITY_EVENTS) {
        this.ws.off(event, onActivity);
      }
      this.ws.off('close', onClose);
    };
  }
}
