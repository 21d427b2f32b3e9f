/**
 * Structured logging for the outreach pipeline
 * Outputs JSON logs suitable for parsing and analysis
 */

import * as fs from 'fs';
import * as path from 'path';
import { env, ensureDir } from './env';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LogContext {
  stage?: string;
  sessionId?: string;
  leadId?: string;
  runId?: string;
}

export interface LogEntry extends LogContext {
  timestamp: string;
  level: Exclude<LogLevel, 'silent'>;
  message: string;
  data?: Record<string, unknown>;
}

const levelPriority: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

function parseLevel(value: string | undefined): LogLevel {
  switch (value) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
    case 'silent':
      return value;
    default:
      return 'info';
  }
}

interface LoggerSink {
  logFile: string | null;
  minLevel: LogLevel;
}

function createSink(): LoggerSink {
  const today = new Date().toISOString().split('T')[0];
  const fileEnabled = process.env.LOG_TO_FILE !== 'false';
  return {
    logFile: fileEnabled ? path.join(env.LOG_DIR, `outreach-pipeline-${today}.log`) : null,
    minLevel: parseLevel(process.env.LOG_LEVEL),
  };
}

export class Logger {
  private readonly sink: LoggerSink;
  private readonly context: LogContext;

  constructor(context: LogContext = {}, sink: LoggerSink = createSink()) {
    this.context = context;
    this.sink = sink;
  }

  // Concurrent lead runs each get their own child so context never leaks between them
  child(context: LogContext): Logger {
    return new Logger({ ...this.context, ...context }, this.sink);
  }

  private shouldLog(level: LogLevel): boolean {
    return levelPriority[level] >= levelPriority[this.sink.minLevel];
  }

  private formatEntry(
    level: Exclude<LogLevel, 'silent'>,
    message: string,
    data?: Record<string, unknown>
  ): LogEntry {
    return {
      timestamp: new Date().toISOString(),
      level,
      ...this.context,
      message,
      data,
    };
  }

  private write(entry: LogEntry): void {
    const line = JSON.stringify(entry) + '\n';

    if (this.sink.logFile) {
      ensureDir(path.dirname(this.sink.logFile));
      fs.appendFileSync(this.sink.logFile, line);
    }

    const colors: Record<LogEntry['level'], string> = {
      debug: '\x1b[90m',  // gray
      info: '\x1b[36m',   // cyan
      warn: '\x1b[33m',   // yellow
      error: '\x1b[31m',  // red
    };
    const reset = '\x1b[0m';
    const prefix = `[${entry.timestamp}] [${entry.level.toUpperCase()}]`;
    const scope = [entry.stage, entry.sessionId, entry.leadId].filter(Boolean).join(' ');
    const context = scope ? ` [${scope}]` : '';

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

  // Every rejected record and halted stage goes through here
  logFailure(subject: string, failureType: string, details?: Record<string, unknown>): void {
    this.warn(`Failure: ${failureType}`, {
      subject,
      failureType,
      ...details,
    });
  }
}

export const logger = new Logger();
