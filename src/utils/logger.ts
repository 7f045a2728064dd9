/**
 * Winston-based structured logging
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import fs from 'fs';

export interface LoggerOptions {
  level?: string;
  /** When set, JSON lines are also written to daily-rotated files here */
  dir?: string;
  silent?: boolean;
}

let _logger: winston.Logger | null = null;

export function initLogger(opts: LoggerOptions = {}): winston.Logger {
  const level = opts.level || 'info';

  const transports: winston.transport[] = [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.timestamp({ format: 'HH:mm:ss' }),
        winston.format.printf(({ level, message, timestamp, component, ...meta }) => {
          const scope = typeof component === 'string' ? `[${component}] ` : '';
          const metaStr = Object.keys(meta).length ? ' ' + JSON.stringify(meta) : '';
          return `${timestamp} ${level} ${scope}${message}${metaStr}`;
        })
      ),
    }),
  ];

  if (opts.dir) {
    fs.mkdirSync(opts.dir, { recursive: true });
    transports.push(
      new DailyRotateFile({
        dirname: opts.dir,
        filename: 'genai-netops-%DATE%.log',
        datePattern: 'YYYY-MM-DD',
        maxSize: '10m',
        maxFiles: '7d',
        format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
      })
    );
  }

  if (_logger) {
    _logger.close();
  }

  _logger = winston.createLogger({
    level,
    silent: opts.silent ?? false,
    transports,
  });

  return _logger;
}

export function getLogger(): winston.Logger {
  if (!_logger) {
    return initLogger({ silent: process.env.NODE_ENV === 'test' });
  }
  return _logger;
}

export type LogMethod = (message: string, meta?: Record<string, unknown>) => void;

export interface ComponentLogger {
  error: LogMethod;
  warn: LogMethod;
  info: LogMethod;
  http: LogMethod;
  debug: LogMethod;
}

/**
 * Logger scoped to one module; resolved on each call so initLogger() may run later
 */
export function createLogger(component: string): ComponentLogger {
  const write =
    (level: string): LogMethod =>
    (message, meta = {}) => {
      getLogger().log(level, message, { component, ...meta });
    };
  return {
    error: write('error'),
    warn: write('warn'),
    info: write('info'),
    http: write('http'),
    debug: write('debug'),
  };
}
