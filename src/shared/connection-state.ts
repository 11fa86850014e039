/**
 * Connection State Types
 *
 * The monitor only needs to know whether the connection it watches is
 * currently connected.
 */

/**
 * Lifecycle state reported by a monitored connection
 */
export type ConnectionState = 'connecting' | 'connected' | 'reconnecting' | 'disconnected';

/**
 * Anything the heartbeat monitor can watch
 */
export interface MonitoredConnection {
  /** Current connectivity state, queried once per check */
  getState(): ConnectionState;
}
