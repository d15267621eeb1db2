// src/core/logger.ts
import fs from 'node:fs';
import path from 'node:path';
import { describeError } from './errors.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogCategory =
  | 'cli'
  | 'sync'
  | 'catalog'
  | 'records'
  | 'storage'
  | 'site'
  | 'checkpoint'
  | 'remediation';

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

export function formatLine(timestamp: string, level: LogLevel, category: LogCategory, message: string): string {
  return `${timestamp} ${level.toUpperCase().padEnd(5)} [${category}] ${message}`;
}

const pad = (value: number) => String(value).padStart(2, '0');

/** `<dir>/YYYYMMDD/HH.log`, in local time. */
export function hourlyLogPath(dir: string, at: Date): string {
  const day = `${at.getFullYear()}${pad(at.getMonth() + 1)}${pad(at.getDate())}`;
  return path.join(dir, day, `${pad(at.getHours())}.log`);
}

/** Appends log lines to one file per hour under `dir`. */
export class HourlyFileSink {
  constructor(
    readonly dir: string,
    private readonly clock: () => Date = () => new Date()
  ) {}

  write(line: string): void {
    const file = hourlyLogPath(this.dir, this.clock());
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.appendFileSync(file, `${line}\n`, 'utf-8');
  }
}

class Logger {
  private logLevel: LogLevel = 'info';
  private sink?: HourlyFileSink;

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.logLevel);
  }

  private log(level: LogLevel, category: LogCategory, message: string): void {
    if (!this.shouldLog(level)) return;

    const line = formatLine(new Date().toISOString(), level, category, message);

    switch (level) {
      case 'debug':
        console.debug(line);
        break;
      case 'info':
        console.info(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      case 'error':
        console.error(line);
        break;
    }

    if (this.sink) {
      try {
        this.sink.write(line);
      } catch (error) {
        const { dir } = this.sink;
        this.sink = undefined;
        console.error(`Could not write to log directory ${dir}, file logging disabled: ${describeError(error)}`);
      }
    }
  }

  debug(category: LogCategory, message: string): void {
    this.log('debug', category, message);
  }

  info(category: LogCategory, message: string): void {
    this.log('info', category, message);
  }

  warn(category: LogCategory, message: string): void {
    this.log('warn', category, message);
  }

  error(category: LogCategory, message: string): void {
    this.log('error', category, message);
  }

  banner(category: LogCategory, title: string): void {
    const rule = '='.repeat(60);
    this.info(category, rule);
    this.info(category, title);
    this.info(category, rule);
  }

  setLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  getLevel(): LogLevel {
    return this.logLevel;
  }

  /** Also write every line to `sink`; `undefined` goes back to console only. */
  setFileSink(sink: HourlyFileSink | undefined): void {
    this.sink = sink;
  }
}

export const logger = new Logger();

/** Short, log-safe preview of a credential. */
export function maskToken(token: string): string {
  return token.length <= 8 ? '***' : `${token.slice(0, 8)}...`;
}
