/** Structured project logging: JSONL for machine consumption, .log for humans, console for devs. */

import fs from 'node:fs';
import path from 'node:path';
import { DEFAULT_LOG_LEVEL, LOG_VALUE_CAP, PROJECT_CONFIG_DIR } from './constants.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogData = Record<string, unknown>;

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  data?: LogData;
}

/** The slice of the logger the engine depends on. */
export interface Logger {
  debug(event: string, data?: LogData): void;
  info(event: string, data?: LogData): void;
  warn(event: string, data?: LogData): void;
  error(event: string, data?: LogData): void;
}

export interface ProjectLoggerOptions {
  /** Directory for project.jsonl and project.log. Omit for console-only logging. */
  logDir?: string;
  level?: LogLevel;
  /** Echo to the console. Defaults to true. */
  console?: boolean;
  /** Receives every entry at or above the level; used by tests and the server. */
  sink?: (entry: LogEntry) => void;
}

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LEVEL_RANK, value);
}

export class ProjectLogger implements Logger {
  readonly level: LogLevel;
  private jsonlPath: string | null = null;
  private textPath: string | null = null;
  private echo: boolean;
  private sink?: (entry: LogEntry) => void;

  constructor(options: ProjectLoggerOptions = {}) {
    this.level = options.level ?? (isLogLevel(DEFAULT_LOG_LEVEL) ? DEFAULT_LOG_LEVEL : 'info');
    this.echo = options.console ?? true;
    this.sink = options.sink;
    if (options.logDir) {
      fs.mkdirSync(options.logDir, { recursive: true });
      this.jsonlPath = path.join(options.logDir, 'project.jsonl');
      this.textPath = path.join(options.logDir, 'project.log');
    }
  }

  /** Logger writing under `<projectDir>/.pipeflow/logs`. */
  static forProject(projectDir: string, options: Omit<ProjectLoggerOptions, 'logDir'> = {}): ProjectLogger {
    return new ProjectLogger({ ...options, logDir: path.join(projectDir, PROJECT_CONFIG_DIR, 'logs') });
  }

  /** Write a structured log entry. */
  log(level: LogLevel, event: string, data?: LogData): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.level]) return;
    const timestamp = new Date().toISOString();
    const entry: LogEntry = { timestamp, level, event, ...(data !== undefined ? { data } : {}) };
    const dataStr = data ? ' ' + formatData(data) : '';

    if (this.jsonlPath && this.textPath) {
      try {
        fs.appendFileSync(this.jsonlPath, JSON.stringify(entry) + '\n');
        fs.appendFileSync(this.textPath, `[${timestamp}] [${level.toUpperCase()}] ${event}${dataStr}\n`);
      } catch (err) {
        // Stop writing files after the first failure; console output continues.
        console.warn(`[pipeflow] Log file write failed, file logging disabled: ${String(err)}`);
        this.jsonlPath = null;
        this.textPath = null;
      }
    }

    this.sink?.(entry);

    if (!this.echo) return;
    const consoleMsg = `[pipeflow] ${event}${dataStr}`;
    if (level === 'error') {
      console.error(consoleMsg);
    } else if (level === 'warn') {
      console.warn(consoleMsg);
    } else {
      console.log(consoleMsg);
    }
  }

  debug(event: string, data?: LogData): void {
    this.log('debug', event, data);
  }

  info(event: string, data?: LogData): void {
    this.log('info', event, data);
  }

  warn(event: string, data?: LogData): void {
    this.log('warn', event, data);
  }

  error(event: string, data?: LogData): void {
    this.log('error', event, data);
  }
}

/** Format a data object for a human-readable log line. */
export function formatData(data: LogData): string {
  const parts: string[] = [];
  for (const [key, value] of Object.entries(data)) {
    if (typeof value === 'string' && value.length > LOG_VALUE_CAP) {
      parts.push(`${key}=[${value.length} chars]`);
    } else if (typeof value === 'object' && value !== null) {
      parts.push(`${key}=${JSON.stringify(value)}`);
    } else {
      parts.push(`${key}=${String(value)}`);
    }
  }
  return parts.join(', ');
}

/** Logger that records entries in memory, for tests. */
export class MemoryLogger implements Logger {
  readonly entries: LogEntry[] = [];

  private push(level: LogLevel, event: string, data?: LogData): void {
    this.entries.push({ timestamp: new Date().toISOString(), level, event, ...(data !== undefined ? { data } : {}) });
  }

  debug(event: string, data?: LogData): void {
    this.push('debug', event, data);
  }

  info(event: string, data?: LogData): void {
    this.push('info', event, data);
  }

  warn(event: string, data?: LogData): void {
    this.push('warn', event, data);
  }

  error(event: string, data?: LogData): void {
    this.push('error', event, data);
  }

  events(level?: LogLevel): string[] {
    return this.entries.filter((e) => level === undefined || e.level === level).map((e) => e.event);
  }
}
