/**
 * Structured logger with per-request correlation ids and in-process subscribers.
 */

import { AsyncLocalStorage } from 'node:async_hooks';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'json' | 'text' | 'pretty';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  service: string;
  message: string;
  correlationId?: string;
  data?: Record<string, unknown>;
}

export type LogSubscriber = (entry: LogEntry) => void;

export interface Logger {
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
}

export interface LoggerConfig {
  level?: LogLevel;
  format?: LogFormat;
  /** Prefix lines with an ISO timestamp (default true) */
  timestamp?: boolean;
  service?: string;
  /** Merged into every JSON line */
  metadata?: Record<string, unknown>;
  /** Skip stdout/stderr; subscribers are still notified */
  silent?: boolean;
}

// ═══════════════════════════════════════════════════════════════════
// Correlation
// ═══════════════════════════════════════════════════════════════════

const correlation = new AsyncLocalStorage<string>();

export function getCorrelationId(): string | undefined {
  return correlation.getStore();
}

export function generateCorrelationId(): string {
  return `${Date.now()}-${Math.random().toString(36).slice(2, 15)}`;
}

/**
 * Everything logged inside `fn`, awaited work included, carries `id`.
 */
export function withCorrelationId<T>(id: string, fn: () => Promise<T>): Promise<T> {
  return correlation.run(id, fn);
}

// ═══════════════════════════════════════════════════════════════════
// Settings
// ═══════════════════════════════════════════════════════════════════

const severity: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };
const formats: readonly LogFormat[] = ['json', 'text', 'pretty'];

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(severity, value);
}

export function isLogFormat(value: string): value is LogFormat {
  return formats.some(format => format === value);
}

const settings: Required<Omit<LoggerConfig, 'metadata'>> & Pick<LoggerConfig, 'metadata'> = {
  level: 'info',
  format: 'json',
  timestamp: true,
  service: '',
  silent: false,
};

export function configureLogger(update: LoggerConfig): void {
  Object.assign(settings, update);
}

const subscribers = new Set<LogSubscriber>();

/** Returns the unsubscribe function */
export function subscribeToLogs(subscriber: LogSubscriber): () => void {
  subscribers.add(subscriber);
  return () => {
    subscribers.delete(subscriber);
  };
}

// ═══════════════════════════════════════════════════════════════════
// Rendering
// ═══════════════════════════════════════════════════════════════════

const grey = (text: string) => `\x1b[90m${text}\x1b[0m`;
const tint: Record<LogLevel, string> = { debug: '\x1b[36m', info: '\x1b[32m', warn: '\x1b[33m', error: '\x1b[31m' };

function hasData(entry: LogEntry): entry is LogEntry & { data: Record<string, unknown> } {
  return entry.data !== undefined && Object.keys(entry.data).length > 0;
}

const render: Record<LogFormat, (entry: LogEntry) => string> = {
  json: entry =>
    JSON.stringify({
      ...(settings.timestamp ? { timestamp: entry.timestamp } : {}),
      level: entry.level,
      ...(entry.service ? { service: entry.service } : {}),
      ...(entry.correlationId ? { correlationId: entry.correlationId } : {}),
      message: entry.message,
      ...settings.metadata,
      ...entry.data,
    }),

  text: entry =>
    [
      settings.timestamp ? entry.timestamp : '',
      `[${entry.level.toUpperCase()}]`,
      entry.service ? `[${entry.service}]` : '',
      entry.correlationId ? `[${entry.correlationId}]` : '',
      entry.message,
      hasData(entry) ? JSON.stringify(entry.data) : '',
    ]
      .filter(Boolean)
      .join(' '),

  pretty: entry =>
    [
      settings.timestamp ? grey(entry.timestamp) : '',
      `${tint[entry.level]}${entry.level.toUpperCase().padEnd(5)}\x1b[0m`,
      entry.service ? grey(`[${entry.service}]`) : '',
      entry.correlationId ? grey(`[${entry.correlationId}]`) : '',
      entry.message,
      hasData(entry) ? grey(JSON.stringify(entry.data)) : '',
    ]
      .filter(Boolean)
      .join(' '),
};

function emit(level: LogLevel, service: string, message: string, data?: Record<string, unknown>): void {
  if (severity[level] < severity[settings.level]) return;

  const correlationId = getCorrelationId();
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    service,
    message,
    ...(correlationId ? { correlationId } : {}),
    ...(data ? { data } : {}),
  };

  if (!settings.silent) {
    const stream = level === 'error' ? process.stderr : process.stdout;
    stream.write(`${render[settings.format](entry)}\n`);
  }

  for (const subscriber of subscribers) {
    try {
      subscriber(entry);
    } catch (error) {
      // Throwing subscribers are unsubscribed
      subscribers.delete(subscriber);
      process.stderr.write(`Log subscriber removed: ${error instanceof Error ? error.message : String(error)}\n`);
    }
  }
}

function bind(service: () => string, extra?: Record<string, unknown>): Logger {
  const write = (level: LogLevel) => (msg: string, data?: Record<string, unknown>) =>
    emit(level, service(), msg, extra ? { ...extra, ...data } : data);
  return { debug: write('debug'), info: write('info'), warn: write('warn'), error: write('error') };
}

/** Root logger, tagged with the configured service name */
export const logger: Logger = bind(() => settings.service);

/**
 * Scoped logger. The service name is read on every call, so children created
 * at module load pick up `configureLogger` changes made later at startup.
 */
export function createChildLogger(scope: { service?: string; metadata?: Record<string, unknown> }): Logger {
  return bind(() => scope.service || settings.service, scope.metadata);
}
