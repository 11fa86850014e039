#!/usr/bin/env node
/**
 * Keep-Alive Monitor CLI Entry Point
 *
 * Connects to a WebSocket endpoint and reports when it goes quiet. Exits with
 * a non-zero code once the connection times out.
 */

import { WebSocket } from 'ws';
import { HeartbeatMonitor } from './heartbeat-monitor.js';
import { WebSocketConnection } from './ws-connection.js';
import { HELP_TEXT, parseArgs, toKeepAliveData } from './config.js';
import { createLogger, setVerbose } from './logger.js';
import { ErrorCode, formatError, toMonitorError } from '../shared/errors.js';

const logger = createLogger('client');

async function main(): Promise<void> {
  const parsed = parseArgs(process.argv.slice(2), process.env);
  if (parsed.help) {
    console.log(HELP_TEXT);
    return;
  }

  const { config } = parsed;
  setVerbose(config.verbose);

  logger.info(`Connecting to ${config.url}`);

  const ws = new WebSocket(config.url);
  const connection = new WebSocketConnection(ws);

  const monitor = new HeartbeatMonitor({
    onWarning: () => {
      logger.warn('No activity received, connection may be slow', { url: config.url });
    },
    onTimeout: () => {
      const { code, message } = formatError(ErrorCode.CONNECTION_TIMEOUT, config.url);
      logger.error(message, { code });
      process.exitCode = 1;
      ws.terminate();
    },
  });

  const detach = connection.attach(monitor);

  ws.on('open', () => {
    const keepAliveData = toKeepAliveData(config);
    logger.info('Connected', keepAliveData.toConfig());
    monitor.start(keepAliveData, connection);
  });

  ws.on('close', (code, reason) => {
    detach();
    logger.info('Disconnected', { code, reason: reason.toString() });
  });

  ws.on('error', (err) => {
    const failure = formatError(ErrorCode.CONNECTION_FAILED, err.message);
    logger.error(failure.message, { code: failure.code });
    process.exitCode = 1;
  });

  process.on('SIGINT', () => {
    logger.info('Shutting down...');
    monitor.stop();
    ws.close(1000, 'Client shutting down');
  });
}

main().catch((err: unknown) => {
  const failure = toMonitorError(err);
  logger.error(failure.message, { code: failure.code, category: failure.category });
  process.exit(1);
});
