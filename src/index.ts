export { HeartbeatMonitor } from './client/heartbeat-monitor.js';
export type {
  HeartbeatHandler,
  HeartbeatMonitorOptions,
  HeartbeatStatus,
} from './client/heartbeat-monitor.js';
export { WebSocketConnection, ACTIVITY_EVENTS } from './client/ws-connection.js';
export { createLogger, setVerbose, isVerbose } from './client/logger.js';
export type { Logger, LogLevel, LogContext } from './client/logger.js';
export {
  KeepAliveData,
  KeepAliveConfigSchema,
  MAX_CHECK_INTERVAL,
  deriveKeepAliveConfig,
} from './shared/keep-alive-data.js';
export type { KeepAliveConfig } from './shared/keep-alive-data.js';
export type { ConnectionState, MonitoredConnection } from './shared/connection-state.js';
export {
  ErrorCode,
  MonitorError,
  InvalidArgumentError,
  isMonitorError,
  toMonitorError,
  getErrorCategory,
  getErrorMessage,
  formatError,
} from './shared/errors.js';
export type { ErrorCategory } from './shared/errors.js';
