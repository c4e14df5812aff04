/**
 * Logger
 *
 * Pino-based structured logger. One root logger is created by the
 * entry point and passed down; components derive child loggers from it.
 */

import {
  levels,
  pino,
  stdTimeFunctions,
  transport,
  type Logger as PinoLogger,
  type TransportTargetOptions,
} from 'pino';

export type Logger = PinoLogger;

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

export interface LoggerOptions {
  level: LogLevel;
  /** Persistent log, appended to as JSON lines */
  logFile?: string;
  /** Pretty, timestamped output on stdout */
  console?: boolean;
  env?: string;
}

/**
 * Create the root logger
 */
export function createLogger(options: LoggerOptions): Logger {
  const targets: TransportTargetOptions[] = [];

  if (options.logFile) {
    targets.push({
      target: 'pino/file',
      level: 'debug',
      options: { destination: options.logFile, append: true, mkdir: true },
    });
  }

  if (options.console !== false) {
    targets.push({
      target: 'pino-pretty',
      level: options.level,
      options: {
        colorize: true,
        translateTime: 'SYS:yyyy-mm-dd HH:MM:ss',
        ignore: 'pid,hostname,service,env',
        destination: 1,
      },
    });
  }

  const base = {
    service: 'hls-ladder',
    env: options.env ?? 'development',
  };

  // No file and no console: nothing to write to
  if (targets.length === 0) {
    return createNullLogger();
  }

  // The file target records debug output even when the console is quieter
  const level = options.logFile && levelRank(options.level) > levelRank('debug')
    ? 'debug'
    : options.level;

  return pino(
    {
      level,
      base,
      timestamp: stdTimeFunctions.isoTime,
    },
    transport({ targets })
  );
}

/**
 * A logger that discards everything, for tests and library callers
 */
export function createNullLogger(): Logger {
  return pino({ level: 'silent' });
}

function levelRank(level: LogLevel): number {
  return levels.values[level] ?? 30;
}
