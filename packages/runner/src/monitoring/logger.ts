import { randomUUID } from 'node:crypto';
import type { MiddlewareHandler } from 'hono';
import { getEnv } from '../config/env.js';

// --- Types ---

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  level: LogLevel;
  msg: string;
  timestamp: string;
  service: string;
  requestId?: string;
  workerId?: string;
  workItemId?: string;
  [key: string]: unknown;
}

export interface LoggerOptions {
  level?: LogLevel;
  service?: string;
  requestId?: string;
  workerId?: string;
  workItemId?: string;
}

// --- Log level ordering ---

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// --- Secret and PHI redaction ---

// Matched case-insensitively as substrings of the key.
const SENSITIVE_KEYS = [
  'password',
  'passwd',
  'secret',
  'token',
  'api_key',
  'apikey',
  'api-key',
  'authorization',
  'cookie',
  'credential',
  'private_key',
  'privatekey',
  'connection_string',
  'connectionstring',
  'database_url',
  'service_key',
  'servicekey',
  'storagestate',
  'memberid',
  'member_id',
  'subscriberid',
  'dateofbirth',
  'date_of_birth',
  'dob',
  'ssn',
  'social_security',
];

const SENSITIVE_PATTERNS = [
  /(?:sk|pk|key|token|secret|password)[_-]?[a-zA-Z0-9]{16,}/g,
  /(?:eyJ)[a-zA-Z0-9._-]{20,}/g, // JWTs
  /postgres(?:ql)?:\/\/[^\s"']+/g, // connection strings
  /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g, // Email addresses
  /\b\d{3}-\d{2}-\d{4}\b/g, // SSN format (xxx-xx-xxxx)
];

function isSensitiveKey(key: string): boolean {
  const lowerKey = key.toLowerCase();
  return SENSITIVE_KEYS.some((sensitive) => lowerKey.includes(sensitive));
}

function redactValue(key: string, value: unknown): unknown {
  if (typeof value === 'string') {
    if (isSensitiveKey(key)) {
      return '[REDACTED]';
    }
    let redacted = value;
    for (const pattern of SENSITIVE_PATTERNS) {
      redacted = redacted.replace(pattern, '[REDACTED]');
    }
    return redacted;
  }
  return value;
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

export function redactObject(obj: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (isPlainRecord(value)) {
      result[key] = redactObject(value);
    } else if (Array.isArray(value)) {
      result[key] = value.map((item) =>
        isPlainRecord(item) ? redactObject(item) : redactValue(key, item),
      );
    } else {
      result[key] = redactValue(key, value);
    }
  }
  return result;
}

// --- Logger ---

/** Where formatted lines go. Errors and warnings use their own streams. */
export type LogSink = (level: LogLevel, line: string) => void;

const consoleSink: LogSink = (level, line) => {
  if (level === 'error') console.error(line);
  else if (level === 'warn') console.warn(line);
  else if (level === 'debug') console.debug(line);
  else console.log(line);
};

export class Logger {
  private readonly level: LogLevel;
  private readonly service: string;
  private readonly bindings: Record<string, unknown>;
  private readonly sink: LogSink;

  constructor(opts: LoggerOptions = {}, bindings: Record<string, unknown> = {}, sink: LogSink = consoleSink) {
    const { level, service, ...context } = opts;
    const env = getEnv();
    this.level = level ?? env.LOG_LEVEL ?? (env.NODE_ENV === 'production' ? 'info' : 'debug');
    this.service = service ?? 'portalrunner';
    this.bindings = { ...stripUndefined(context), ...bindings };
    this.sink = sink;
  }

  child(bindings: Record<string, unknown>): Logger {
    return new Logger({ level: this.level, service: this.service }, { ...this.bindings, ...bindings }, this.sink);
  }

  debug(msg: string, data?: Record<string, unknown>): void {
    this.write('debug', msg, data);
  }

  info(msg: string, data?: Record<string, unknown>): void {
    this.write('info', msg, data);
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    this.write('warn', msg, data);
  }

  error(msg: string, data?: Record<string, unknown>): void {
    this.write('error', msg, data);
  }

  private write(level: LogLevel, msg: string, data: Record<string, unknown> = {}): void {
    if (LOG_LEVEL_ORDER[level] < LOG_LEVEL_ORDER[this.level]) return;

    const entry: LogEntry = {
      level,
      msg,
      timestamp: new Date().toISOString(),
      service: this.service,
      ...this.bindings,
      ...redactObject(data),
    };
    this.sink(level, JSON.stringify(entry));
  }
}

function stripUndefined(record: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(record).filter(([, value]) => value !== undefined));
}

let defaultLogger: Logger | undefined;

/**
 * Shared logger when called bare; a dedicated one when options are given
 * (usually a per-module `service` name).
 */
export function getLogger(opts?: LoggerOptions): Logger {
  if (opts) return new Logger(opts);
  defaultLogger ??= new Logger();
  return defaultLogger;
}

// --- Hono middleware for request logging ---

export function requestLoggingMiddleware(): MiddlewareHandler {
  return async (c, next) => {
    const requestId = c.req.header('x-request-id') ?? randomUUID();
    const start = Date.now();

    const log = getLogger().child({ requestId });

    log.info('request_started', {
      method: c.req.method,
      path: c.req.path,
      userAgent: c.req.header('user-agent'),
    });

    c.header('X-Request-Id', requestId);

    await next();

    log.info('request_completed', {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - start,
    });
  };
}
