import chalk from 'chalk';
import * as fs from 'fs-extra';
import * as path from 'path';

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const LEVEL_ORDER: LogLevel[] = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

/**
 * Anything the engine can report through. Structural, so callers can hand in
 * their own telemetry sink without extending Logger.
 */
export interface EngineLogger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  /** When set, every line is also appended to `<logDir>/<yyyy-mm-dd>.log`. */
  logDir?: string;
}

export function parseLogLevel(value: string | undefined, fallback: LogLevel = LogLevel.INFO): LogLevel {
  const normalized = (value ?? '').trim().toUpperCase();
  const match = LEVEL_ORDER.find(level => level === normalized);
  return match ?? fallback;
}

export class Logger implements EngineLogger {
  private level: LogLevel;
  private logDir?: string;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? parseLogLevel(process.env.LOG_LEVEL);
    this.logDir = options.logDir;
    if (this.logDir) {
      fs.ensureDirSync(this.logDir);
    }
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.level);
  }

  private formatMessage(level: LogLevel, message: string, ...args: unknown[]): string {
    const timestamp = new Date().toISOString();
    const formattedArgs = args.map(arg =>
      typeof arg === 'object' ? JSON.stringify(arg, null, 2) : String(arg)
    ).join(' ');
    return `[${timestamp}] [${level}] ${message} ${formattedArgs}`.trimEnd();
  }

  private writeToFile(formatted: string): void {
    if (!this.logDir) {
      return;
    }
    const logFile = path.join(this.logDir, `${new Date().toISOString().split('T')[0]}.log`);
    fs.appendFileSync(logFile, formatted + '\n');
  }

  debug(message: string, ...args: unknown[]): void {
    if (!this.shouldLog(LogLevel.DEBUG)) return;
    const formatted = this.formatMessage(LogLevel.DEBUG, message, ...args);
    console.log(chalk.gray(formatted));
    this.writeToFile(formatted);
  }

  info(message: string, ...args: unknown[]): void {
    if (!this.shouldLog(LogLevel.INFO)) return;
    const formatted = this.formatMessage(LogLevel.INFO, message, ...args);
    console.log(chalk.blue(formatted));
    this.writeToFile(formatted);
  }

  warn(message: string, ...args: unknown[]): void {
    if (!this.shouldLog(LogLevel.WARN)) return;
    const formatted = this.formatMessage(LogLevel.WARN, message, ...args);
    console.log(chalk.yellow(formatted));
    this.writeToFile(formatted);
  }

  error(message: string, ...args: unknown[]): void {
    if (!this.shouldLog(LogLevel.ERROR)) return;
    const formatted = this.formatMessage(LogLevel.ERROR, message, ...args);
    console.error(chalk.red(formatted));
    this.writeToFile(formatted);
  }
}

export const logger = new Logger();
