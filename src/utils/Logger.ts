import winston, { format, transports, Logger as WinstonLogger } from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { v4 as uuidv4 } from 'uuid';
import os from 'os';

const { combine, timestamp, printf, colorize, json, errors } = format;

export enum LogLevel {
  ERROR = 'error',
  WARN = 'warn',
  INFO = 'info',
  DEBUG = 'debug',
  TRACE = 'trace'
}

const levels: Record<LogLevel, number> = {
  [LogLevel.ERROR]: 0,
  [LogLevel.WARN]: 1,
  [LogLevel.INFO]: 2,
  [LogLevel.DEBUG]: 3,
  [LogLevel.TRACE]: 4
};

winston.addColors({
  [LogLevel.ERROR]: 'red',
  [LogLevel.WARN]: 'yellow',
  [LogLevel.INFO]: 'green',
  [LogLevel.DEBUG]: 'blue',
  [LogLevel.TRACE]: 'gray'
});

export interface LoggerConfig {
  level: string;
  file?: string;
  maxSize?: string;
  maxFiles?: string;
  datePattern?: string;
}

const consoleFormat = printf(({ level, message, timestamp, ...meta }) => {
  const metaString = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
  return `${timestamp} [${level}]: ${message}${metaString}`;
});

// Correlates every line written by this process
const sessionId = uuidv4();

function createTransports(config: LoggerConfig): winston.transport[] {
  const transportList: winston.transport[] = [
    new transports.Console({
      format: combine(
        colorize({ all: true }),
        timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        consoleFormat
      )
    })
  ];

  if (config.file) {
    transportList.push(
      new DailyRotateFile({
        filename: config.file,
        datePattern: config.datePattern || 'YYYY-MM-DD',
        zippedArchive: true,
        maxSize: config.maxSize || '20m',
        maxFiles: config.maxFiles || '14d',
        format: combine(timestamp(), errors({ stack: true }), json())
      })
    );
  }

  return transportList;
}

function createWinstonLogger(config: LoggerConfig): WinstonLogger {
  return winston.createLogger({
    levels,
    level: config.level,
    silent: process.env.NODE_ENV === 'test',
    defaultMeta: {
      service: 'lumenlink',
      hostname: os.hostname(),
      pid: process.pid
    },
    transports: createTransports(config),
    exitOnError: false
  });
}

/**
 * Thin wrapper around winston that carries a context object into every line.
 * Use `child()` to scope a logger to a device or component.
 */
export class Logger {
  private static instance?: Logger;
  private static shared: WinstonLogger = createWinstonLogger({
    level: process.env.LOG_LEVEL || LogLevel.INFO
  });

  private context: Record<string, unknown>;

  constructor(context: Record<string, unknown> = {}) {
    this.context = context;
  }

  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  /**
   * Rebuilds the underlying winston logger. Existing Logger objects,
   * children included, pick up the new transports.
   */
  static configure(config: LoggerConfig): void {
    Logger.shared.close();
    Logger.shared = createWinstonLogger(config);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, meta);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, meta);
  }

  trace(message: string, meta?: Record<string, unknown>): void {
    this.log(LogLevel.TRACE, message, meta);
  }

  child(context: Record<string, unknown>): Logger {
    return new Logger({ ...this.context, ...context });
  }

  private log(level: LogLevel, message: string, meta: Record<string, unknown> = {}): void {
    Logger.shared.log(level, message, {
      ...this.context,
      ...meta,
      sessionId
    });
  }
}

export default Logger;
