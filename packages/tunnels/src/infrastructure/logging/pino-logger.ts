/**
 * @file pino-logger.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license MIT
 */

import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';

export interface LoggerConfig {
  level: string;
  name: string;
  pretty?: boolean;
  /** Write to this stream instead of stderr; ignored when `pretty` is set */
  destination?: DestinationStream;
}

/**
 * Creates a configured pino logger instance.
 */
export function createLogger(config: LoggerConfig): Logger {
  const options: LoggerOptions = {
    name: config.name,
    level: config.level,
    formatters: {
      level: (label) => ({ level: label }),
    },
    // Credentials reach the logger through launch contexts and signed headers
    redact: {
      paths: [
        'accessKeyId',
        'secretAccessKey',
        'sessionToken',
        '*.accessKeyId',
        '*.secretAccessKey',
        '*.sessionToken',
        'headers.authorization',
        'headers["x-amz-security-token"]',
        'env.AWS_SECRET_ACCESS_KEY',
        'env.AWS_SESSION_TOKEN',
      ],
      censor: '****',
    },
  };

  // pino-pretty for interactive terminals
  if (config.pretty) {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    });
  }

  if (config.destination) {
    return pino(options, config.destination);
  }

  return pino(options, pino.destination(2));
}

/**
 * Logger that discards everything; used by tests and library callers without logging.
 */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}

export type { Logger } from 'pino';
