/**
 * Logger
 *
 * Pino-based structured logger for all packages.
 * Provides consistent logging across the monorepo.
 */

import { pino, type Logger as PinoLogger, type TransportTargetOptions } from 'pino';

const LOG_LEVEL = process.env['LOG_LEVEL'] ?? 'info';
const NODE_ENV = process.env['NODE_ENV'] ?? 'development';

export interface RootLoggerOptions {
  service: string;
  level?: string;
  env?: string;
  /**
   * Append every line, as JSON, to this file as well.
   * The dashboard's log viewer reads it back.
   */
  activityLogPath?: string;
  pretty?: boolean;
}

/**
 * Build a root logger for a process.
 */
export function createRootLogger(options: RootLoggerOptions): Logger {
  const level = options.level ?? LOG_LEVEL;
  const env = options.env ?? NODE_ENV;
  const pretty = options.pretty ?? env === 'development';

  const targets: TransportTargetOptions[] = [
    pretty
      ? {
          target: 'pino-pretty',
          level,
          options: { colorize: true, ignore: 'pid,hostname' },
        }
      : { target: 'pino/file', level, options: { destination: 1 } },
  ];

  if (options.activityLogPath) {
    targets.push({
      target: 'pino/file',
      level,
      options: { destination: options.activityLogPath, mkdir: true, append: true },
    });
  }

  return pino({
    level,
    // formatters.level cannot be combined with transport.targets
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: options.service,
      env,
    },
    transport: level === 'silent' ? undefined : { targets },
  });
}

export const logger = pino({
  level: LOG_LEVEL,
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  base: {
    service: 'seedsync',
    env: NODE_ENV,
  },
  transport: NODE_ENV === 'development' ? {
    target: 'pino-pretty',
    options: {
      colorize: true,
      ignore: 'pid,hostname',
    },
  } : undefined,
});

export type Logger = PinoLogger;

/**
 * Create a child logger with additional context
 */
export function createLogger(context: Record<string, unknown>, parent: Logger = logger): Logger {
  return parent.child(context);
}
