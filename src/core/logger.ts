import pino, { type DestinationStream, type Logger } from 'pino';
import type { BridgeConfig } from './config.js';

/**
 * Create the process logger. The MCP entry point passes stderr as the
 * destination because stdout carries the protocol.
 */
export function createLogger(
  cfg: Pick<BridgeConfig, 'TASKLINK_LOG_LEVEL'>,
  destination?: DestinationStream
): Logger {
  const options = {
    name: 'tasklink',
    level: cfg.TASKLINK_LOG_LEVEL,
    redact: {
      paths: [
        'req.headers.authorization',
        'req.headers.cookie',
        'req.headers["x-api-key"]',
        'headers.authorization',
        'token',
        'session.token'
      ],
      censor: '[redacted]'
    }
  };
  return destination ? pino(options, destination) : pino(options);
}
