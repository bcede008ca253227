import chalk from 'chalk';
import * as fs from 'fs-extra';
import * as path from 'path';
import type { Logger as LoggerInterface } from '../../src/interfaces';
import type { LogLevel } from './types';

export interface LoggerConfig {
  level: LogLevel;
  logToFile?: boolean;
  logFilePath?: string;
  maxLogSize?: number; // in bytes
  keepOldLogs?: number; // number of old log files to keep
  console?: boolean; // also print to the terminal, default true
}

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

const COLORS: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.blue,
  warn: chalk.yellow,
  error: chalk.red
};

// eslint-disable-next-line no-control-regex
const ANSI_CODES = /\x1b\[[0-9;]*m/g;

/**
 * Level-filtered console logger with optional size-rotated log file
 */
export class Logger implements LoggerInterface {
  private level: LogLevel;
  private logFilePath?: string;
  private maxLogSize: number;
  private keepOldLogs: number;
  private toConsole: boolean;

  constructor(config: LogLevel | LoggerConfig = 'info') {
    const options: LoggerConfig = typeof config === 'string' ? { level: config } : config;

    this.level = options.level;
    this.logFilePath = options.logToFile ? options.logFilePath : undefined;
    this.maxLogSize = options.maxLogSize || 10 * 1024 * 1024; // 10MB
    this.keepOldLogs = options.keepOldLogs || 5;
    this.toConsole = options.console ?? true;

    if (this.logFilePath) {
      fs.ensureDirSync(path.dirname(this.logFilePath));
    }
  }

  private rotateLogFile(filePath: string): void {
    if (!fs.existsSync(filePath) || fs.statSync(filePath).size < this.maxLogSize) {
      return;
    }

    // file.log.N is dropped, file.log.1..N-1 shift up by one
    fs.removeSync(`${filePath}.${this.keepOldLogs}`);
    for (let i = this.keepOldLogs - 1; i >= 1; i--) {
      const older = `${filePath}.${i}`;
      if (fs.existsSync(older)) {
        fs.moveSync(older, `${filePath}.${i + 1}`, { overwrite: true });
      }
    }
    fs.moveSync(filePath, `${filePath}.1`, { overwrite: true });
  }

  private writeToFile(line: string): void {
    if (!this.logFilePath) return;

    try {
      this.rotateLogFile(this.logFilePath);
      fs.appendFileSync(this.logFilePath, line.replace(ANSI_CODES, '') + '\n', 'utf8');
    } catch (error) {
      // If file logging fails, fall back to console
      console.error('Failed to write to log file:', error);
    }
  }

  format(level: LogLevel, message: string, args: unknown[]): string {
    const text = args.length > 0
      ? `${message} ${args.map(arg => (arg instanceof Error ? arg.message : typeof arg === 'object' ? JSON.stringify(arg) : String(arg))).join(' ')}`
      : message;

    return `${chalk.gray(new Date().toISOString())} ${COLORS[level](level.toUpperCase().padEnd(5))} ${text}`;
  }

  private log(level: LogLevel, message: string, args: unknown[]): void {
    if (LEVELS[level] < LEVELS[this.level]) return;

    const line = this.format(level, message, args);
    this.writeToFile(line);

    if (!this.toConsole) return;
    if (level === 'error') {
      console.error(line);
    } else if (level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  }

  debug(message: string, ...args: unknown[]): void {
    this.log('debug', message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.log('info', message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.log('warn', message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.log('error', message, args);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLogFilePath(): string | undefined {
    return this.logFilePath;
  }
}
