/**
 * Logger
 *
 * One pino root for the bot and its packages. Every module logs through a
 * child carrying its `component`; job code adds `jobId` and `userId`.
 * Errors are logged under `error`, which gets pino's error serializer.
 */

import { pino } from 'pino';

const NODE_ENV = process.env['NODE_ENV'] ?? 'development';

export const logger = pino({
  level: NODE_ENV === 'test' ? 'silent' : (process.env['LOG_LEVEL'] ?? 'info'),
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  base: { app: 'trackdrop' },
  serializers: {
    error: pino.stdSerializers.err,
  },
  // Archive passwords travel in progress snapshots and job results
  redact: {
    paths: ['zipPassword', 'password', '*.zipPassword', '*.password'],
    censor: '[hidden]',
  },
  transport: NODE_ENV === 'development' ? {
    target: 'pino-pretty',
    options: {
      colorize: true,
      ignore: 'pid,hostname,app',
    },
  } : undefined,
});

export type Logger = typeof logger;

/**
 * Apply the configured level once config is loaded. Tests stay silent.
 */
export function setLogLevel(level: pino.Level): void {
  if (NODE_ENV !== 'test') {
    logger.level = level;
  }
}

export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}
