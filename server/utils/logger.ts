import * as fs from 'fs';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel | 'silent', number> = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 };

function resolveLogLevel(value: string | undefined): LogLevel | 'silent' {
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

const CURRENT_LOG_LEVEL = resolveLogLevel(process.env.LOG_LEVEL);
// File output is opt-in; console output is always on
const LOG_DIR = process.env.LOG_DIR ? path.resolve(process.env.LOG_DIR) : null;

export interface LogMeta {
  correlationId?: string;
  meetingId?: string;
  template?: string;
  templateVersion?: string | null;
  model?: string;
  duration?: number;
  error?: string;
  stack?: string;
  [key: string]: unknown;
}

export function generateCorrelationId(): string {
  return uuidv4().substring(0, 8);
}

function appendToLogFile(entry: Record<string, unknown>): void {
  if (!LOG_DIR) return;
  const dateStr = new Date().toISOString().split('T')[0];
  const logFile = path.join(LOG_DIR, `analysis-${dateStr}.log`);
  try {
    fs.mkdirSync(LOG_DIR, { recursive: true });
    fs.appendFileSync(logFile, JSON.stringify(entry) + '\n');
  } catch (err) {
    console.error('[Logger] Failed to write to log file:', err);
  }
}

export function log(level: LogLevel, message: string, meta?: LogMeta): void {
  if (LOG_LEVELS[level] < LOG_LEVELS[CURRENT_LOG_LEVEL]) return;

  appendToLogFile({
    timestamp: new Date().toISOString(),
    level,
    message,
    ...meta,
  });

  const correlationPrefix = meta?.correlationId ? `[${meta.correlationId}] ` : '';
  const metaStr = meta ? ` ${JSON.stringify(meta)}` : '';
  const line = `[${level.toUpperCase()}] ${correlationPrefix}${message}${metaStr}`;
  if (level === 'error') {
    console.error(line);
  } else {
    console.log(line);
  }
}

export function logInfo(message: string, meta?: LogMeta): void {
  log('info', message, meta);
}

export function logError(message: string, meta?: LogMeta): void {
  log('error', message, meta);
}

export function logWarn(message: string, meta?: LogMeta): void {
  log('warn', message, meta);
}

export function logDebug(message: string, meta?: LogMeta): void {
  log('debug', message, meta);
}

/**
 * Logger bound to one analysis run (a single meeting, a batch or a report).
 * Every entry carries the run's correlation id and elapsed time.
 */
export class AnalysisLogger {
  private correlationId: string;
  private startTime: number;
  private context: Partial<LogMeta>;
  private stages: Map<string, number> = new Map();

  constructor(context: Partial<LogMeta> = {}) {
    this.correlationId = generateCorrelationId();
    this.startTime = Date.now();
    this.context = context;
  }

  private getMeta(extra?: Partial<LogMeta>): LogMeta {
    return {
      correlationId: this.correlationId,
      ...this.context,
      duration: Date.now() - this.startTime,
      ...extra,
    };
  }

  startStage(name: string): void {
    this.stages.set(name, Date.now());
  }

  endStage(name: string): number {
    const start = this.stages.get(name);
    if (start === undefined) return 0;
    const duration = Date.now() - start;
    this.stages.delete(name);
    return duration;
  }

  info(message: string, extra?: Partial<LogMeta>): void {
    logInfo(message, this.getMeta(extra));
  }

  error(message: string, err?: unknown, extra?: Partial<LogMeta>): void {
    const errorMeta: Partial<LogMeta> = {};
    if (err instanceof Error) {
      errorMeta.error = err.message;
      errorMeta.stack = err.stack;
    } else if (err !== undefined) {
      errorMeta.error = String(err);
    }
    logError(message, this.getMeta({ ...errorMeta, ...extra }));
  }

  warn(message: string, extra?: Partial<LogMeta>): void {
    logWarn(message, this.getMeta(extra));
  }

  debug(message: string, extra?: Partial<LogMeta>): void {
    logDebug(message, this.getMeta(extra));
  }

  child(extra: Partial<LogMeta>): AnalysisLogger {
    const child = new AnalysisLogger({ ...this.context, ...extra });
    child.correlationId = this.correlationId;
    child.startTime = this.startTime;
    return child;
  }
}
