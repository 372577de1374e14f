/**
 * Structured logging for Volume Refresh
 * Outputs JSON logs suitable for parsing and analysis
 */

import * as fs from 'fs';
import * as path from 'path';
import { env } from './env';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  step?: string;
  runId?: string;
  message: string;
  data?: Record<string, unknown>;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_PRIORITY;
}

class Logger {
  private logFile: string;
  private step?: string;
  private runId?: string;
  private minLevel: LogLevel;
  private echo: boolean;

  constructor() {
    const today = new Date().toISOString().split('T')[0];
    this.logFile = path.join(env.LOG_DIR, `volume-refresh-${today}.log`);
    const level = process.env.LOG_LEVEL;
    this.minLevel = isLogLevel(level) ? level : 'info';
    // Jest output stays readable
    this.echo = env.NODE_ENV !== 'test';
  }

  setContext(step?: string, runId?: string): void {
    this.step = step;
    this.runId = runId;
  }

  setStep(step?: string): void {
    this.step = step;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[this.minLevel];
  }

  private formatEntry(level: LogLevel, message: string, data?: Record<string, unknown>): LogEntry {
    return {
      timestamp: new Date().toISOString(),
      level,
      step: this.step,
      runId: this.runId,
      message,
      data,
    };
  }

  private write(entry: LogEntry): void {
    const line = JSON.stringify(entry) + '\n';

    // Write to file
    fs.appendFileSync(this.logFile, line);

    if (!this.echo) {
      return;
    }

    // Also output to console with color coding
    const colors: Record<LogLevel, string> = {
      debug: '\x1b[90m',  // gray
      info: '\x1b[36m',   // cyan
      warn: '\x1b[33m',   // yellow
      error: '\x1b[31m',  // red
    };
    const reset = '\x1b[0m';
    const prefix = `[${entry.timestamp}] [${entry.level.toUpperCase()}]`;
    const context = entry.step ? ` [${entry.step}]` : '';

    console.log(`${colors[entry.level]}${prefix}${context}${reset} ${entry.message}`);
    if (entry.data && Object.keys(entry.data).length > 0) {
      console.log(`  ${JSON.stringify(entry.data)}`);
    }
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (this.shouldLog('debug')) {
      this.write(this.formatEntry('debug', message, data));
    }
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (this.shouldLog('info')) {
      this.write(this.formatEntry('info', message, data));
    }
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (this.shouldLog('warn')) {
      this.write(this.formatEntry('warn', message, data));
    }
  }

  error(message: string, data?: Record<string, unknown>): void {
    if (this.shouldLog('error')) {
      this.write(this.formatEntry('error', message, data));
    }
  }

  // The destination needs an operator before it can serve again
  critical(message: string, data?: Record<string, unknown>): void {
    this.error(message, { severity: 'critical', ...data });
  }
}

export const logger = new Logger();
