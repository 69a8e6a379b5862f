import * as winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import * as path from 'path';
import * as fs from 'fs';
import * as os from 'os';
import { LogLevel } from '../config/agent.config';

export interface WinstonLoggerOptions {
  logLevel: LogLevel;
  logDir: string;
}

export const ACTION_LOG_PREFIX = '[ACTION]';

/**
 * Winston level for an agent log level. NONE has no level; the logger is
 * silenced instead.
 */
export function toWinstonLevel(level: LogLevel): string {
  switch (level) {
    case LogLevel.NONE:
    case LogLevel.ERROR:
      return 'error';
    case LogLevel.INFO:
      return 'info';
    case LogLevel.ACTION:
      return 'verbose';
    case LogLevel.DEBUG:
      return 'debug';
    case LogLevel.ALL:
      return 'silly';
  }
}

function resolveLogDir(requested: string): string {
  const logDir = path.resolve(requested);
  if (fs.existsSync(logDir)) {
    return logDir;
  }
  try {
    fs.mkdirSync(logDir, { recursive: true });
    return logDir;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    console.error(`Failed to create log directory ${logDir}: ${reason}`);
    return os.tmpdir();
  }
}

/**
 * Create the application logger: colorized console plus daily rotated files.
 */
export function createWinstonLogger(options: WinstonLoggerOptions) {
  const level = toWinstonLevel(options.logLevel);
  const silent = options.logLevel === LogLevel.NONE;

  const logFormat = winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    winston.format.printf(({ timestamp, level, message, context, stack }) => {
      const contextStr = context ? `[${String(context)}] ` : '';
      const stackStr = stack ? `\n${String(stack)}` : '';
      return `[${String(timestamp)}] [${level.toUpperCase()}] ${contextStr}${String(message)}${stackStr}`;
    }),
  );

  const consoleFormat = winston.format.combine(
    winston.format.colorize(),
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.printf(({ timestamp, level, message, context }) => {
      const contextStr = context ? `[${String(context)}] ` : '';
      return `[${String(timestamp)}] ${level} ${contextStr}${String(message)}`;
    }),
  );

  const consoleTransport = new winston.transports.Console({
    format: consoleFormat,
    level,
  });

  if (silent) {
    return winston.createLogger({
      level,
      silent,
      transports: [consoleTransport],
    });
  }

  const logDir = resolveLogDir(options.logDir);

  const fileRotateTransport = new DailyRotateFile({
    filename: path.join(logDir, 'steerloop-%DATE%.log'),
    datePattern: 'YYYY-MM-DD',
    zippedArchive: true,
    maxSize: '10m',
    maxFiles: '14d',
    format: logFormat,
    level,
  });

  const errorRotateTransport = new DailyRotateFile({
    filename: path.join(logDir, 'steerloop-error-%DATE%.log'),
    datePattern: 'YYYY-MM-DD',
    zippedArchive: true,
    maxSize: '10m',
    maxFiles: '14d',
    format: logFormat,
    level: 'error',
  });

  return winston.createLogger({
    level,
    transports: [consoleTransport, fileRotateTransport, errorRotateTransport],
  });
}
