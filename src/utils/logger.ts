import winston from 'winston';
import fs from 'fs-extra';
import * as path from 'path';

export type Logger = winston.Logger;

export interface LoggerOptions {
  level?: string;
  /** Directory for `error.log` and `combined.log`; no file transports when omitted. */
  logDir?: string;
  console?: boolean;
  silent?: boolean;
}

// Custom log format
const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    return JSON.stringify({
      timestamp,
      level,
      message,
      ...meta,
    });
  }),
);

/**
 * Builds a logger for one process entry point. Components never import a
 * shared instance; they receive one and derive a child per component.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const transports: winston.transport[] = [];

  if (options.logDir) {
    fs.ensureDirSync(options.logDir);
    transports.push(
      new winston.transports.File({
        filename: path.join(options.logDir, 'error.log'),
        level: 'error',
        maxsize: 10 * 1024 * 1024, // 10MB
        maxFiles: 5,
      }),
      new winston.transports.File({
        filename: path.join(options.logDir, 'combined.log'),
        maxsize: 10 * 1024 * 1024,
        maxFiles: 5,
      }),
    );
  }

  if (options.console) {
    transports.push(
      new winston.transports.Console({
        stderrLevels: ['error', 'warn', 'info', 'debug'],
        format: winston.format.combine(
          winston.format.colorize(),
          winston.format.printf(({ timestamp, level, message, ...meta }) => {
            const metaString = Object.keys(meta).length ? JSON.stringify(meta) : '';
            return `${timestamp} ${level}: ${message} ${metaString}`.trimEnd();
          }),
        ),
      }),
    );
  }

  return winston.createLogger({
    level: options.level ?? process.env.LOG_LEVEL ?? 'info',
    format: logFormat,
    defaultMeta: { service: 'statquery' },
    silent: options.silent ?? transports.length === 0,
    transports,
  });
}

export function silentLogger(): Logger {
  return createLogger({ silent: true });
}

export function componentLogger(parent: Logger | undefined, component: string): Logger {
  return (parent ?? silentLogger()).child({ component });
}
