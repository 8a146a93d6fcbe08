import chalk from 'chalk';
import * as fs from 'fs-extra';
import * as path from 'path';

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

function parseLevel(value: string | undefined): LogLevel {
  const upper = (value || '').toUpperCase();
  if (upper === 'DEBUG' || upper === 'INFO' || upper === 'WARN' || upper === 'ERROR') {
    return LogLevel[upper];
  }
  return LogLevel.INFO;
}

export type ConsoleStream = 'stdout' | 'stderr';

class Logger {
  private consoleStream: ConsoleStream = 'stdout';
  private logDir: string;
  private minLevel: LogLevel;
  private fileEnabled: boolean;

  constructor() {
    this.logDir = process.env.LOG_DIR || path.join(process.cwd(), 'logs');
    this.minLevel = parseLevel(process.env.LOG_LEVEL);
    this.fileEnabled = process.env.LOG_TO_FILE !== 'false';
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  /** Errors always go to stderr; `stderr` sends every level there. */
  setConsoleStream(stream: ConsoleStream): void {
    this.consoleStream = stream;
  }

  private formatMessage(level: LogLevel, message: string, ...args: unknown[]): string {
    const timestamp = new Date().toISOString();
    const formattedArgs = args.map(arg =>
      typeof arg === 'object' ? JSON.stringify(arg, null, 2) : String(arg)
    ).join(' ');
    return `[${timestamp}] [${level}] ${message} ${formattedArgs}`.trimEnd();
  }

  private writeToFile(formatted: string): void {
    if (!this.fileEnabled) return;
    fs.ensureDirSync(this.logDir);
    const logFile = path.join(this.logDir, `${new Date().toISOString().split('T')[0]}.log`);
    fs.appendFileSync(logFile, formatted + '\n');
  }

  private emit(level: LogLevel, colour: (text: string) => string, message: string, args: unknown[]): void {
    const formatted = this.formatMessage(level, message, ...args);
    if (LEVEL_ORDER[level] >= LEVEL_ORDER[this.minLevel]) {
      if (level === LogLevel.ERROR || this.consoleStream === 'stderr') {
        console.error(colour(formatted));
      } else {
        console.log(colour(formatted));
      }
    }
    this.writeToFile(formatted);
  }

  debug(message: string, ...args: unknown[]): void {
    this.emit(LogLevel.DEBUG, chalk.gray, message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.emit(LogLevel.INFO, chalk.blue, message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.emit(LogLevel.WARN, chalk.yellow, message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.emit(LogLevel.ERROR, chalk.red, message, args);
  }
}

export const logger = new Logger();
