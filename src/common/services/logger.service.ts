import { Injectable, LoggerService } from '@nestjs/common';
import * as winston from 'winston';
import 'winston-daily-rotate-file';

export interface LogContext {
  requestId?: string;
  userId?: string;
  role?: string;
  method?: string;
  url?: string;
  statusCode?: number;
  responseTime?: number;
  userAgent?: string;
  ip?: string;
  [key: string]: unknown;
}

export interface LogSettings {
  level: string;
  pretty: boolean;
  writeFiles: boolean;
  directory: string;
}

export const REDACTED = '[REDACTED]';

// Compared after lower-casing and dropping underscores
const SENSITIVE_KEYS = new Set([
  'password',
  'passwordhash',
  'adminpassword',
  'token',
  'accesstoken',
  'authorization',
  'secret',
  'jwtsecret',
]);

const MAX_REDACTION_DEPTH = 6;

const FILE_TRANSPORTS = [
  { name: 'application', level: 'info', maxFiles: '14d' },
  { name: 'error', level: 'error', maxFiles: '30d' },
  { name: 'access', level: 'http', maxFiles: '7d' },
] as const;

export function resolveLogSettings(env: NodeJS.ProcessEnv = process.env): LogSettings {
  const isDevelopment = env.NODE_ENV === 'development';
  return {
    level: env.LOG_LEVEL || (isDevelopment ? 'debug' : 'info'),
    pretty: isDevelopment,
    writeFiles: env.NODE_ENV === 'production' || env.LOG_FILES === 'true',
    directory: env.LOG_DIR || 'logs',
  };
}

function isSensitiveKey(key: string): boolean {
  return SENSITIVE_KEYS.has(key.toLowerCase().replace(/_/g, ''));
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

/** Copies `value`, replacing credential-bearing fields at any depth. */
export function redactSensitive(value: unknown, depth = 0): unknown {
  if (depth >= MAX_REDACTION_DEPTH) {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown) => redactSensitive(item, depth + 1));
  }
  if (!isPlainObject(value)) {
    return value;
  }

  const copy: Record<string, unknown> = {};
  for (const [key, field] of Object.entries(value)) {
    copy[key] = isSensitiveKey(key) ? REDACTED : redactSensitive(field, depth + 1);
  }
  return copy;
}

/** winston format applying {@link redactSensitive} to every metadata field. */
export const redactSecrets = winston.format((info) => {
  for (const key of Object.keys(info)) {
    if (key === 'level' || key === 'message') {
      continue;
    }
    info[key] = isSensitiveKey(key) ? REDACTED : redactSensitive(info[key]);
  }
  return info;
});

const prettyLine = winston.format.printf(({ timestamp, level, message, context, ...meta }) => {
  const contextStr = context ? `[${String(context)}] ` : '';
  const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
  return `${String(timestamp)} ${String(level)}: ${contextStr}${String(message)}${metaStr}`;
});

export function createLogTransports(settings: LogSettings): winston.transport[] {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      level: settings.level,
      format: settings.pretty
        ? winston.format.combine(winston.format.colorize({ all: true }), prettyLine)
        : winston.format.json(),
    }),
  ];

  if (!settings.writeFiles) {
    return transports;
  }

  for (const file of FILE_TRANSPORTS) {
    transports.push(
      new winston.transports.DailyRotateFile({
        filename: `${settings.directory}/${file.name}-%DATE%.log`,
        datePattern: 'YYYY-MM-DD',
        zippedArchive: true,
        maxSize: '20m',
        maxFiles: file.maxFiles,
        level: file.level,
        format: winston.format.json(),
      }),
    );
  }
  return transports;
}

@Injectable()
export class CustomLoggerService implements LoggerService {
  private readonly winston: winston.Logger;
  private context?: string;

  constructor() {
    const settings = resolveLogSettings();
    this.winston = winston.createLogger({
      level: settings.level,
      format: winston.format.combine(
        redactSecrets(),
        winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
        winston.format.errors({ stack: true }),
      ),
      transports: createLogTransports(settings),
      exitOnError: false,
    });
  }

  setContext(context: string): void {
    this.context = context;
  }

  log(message: string, context?: string | LogContext): void {
    this.write('info', message, context);
  }

  error(message: string, trace?: string, context?: string | LogContext): void {
    this.write('error', message, context, { trace });
  }

  warn(message: string, context?: string | LogContext): void {
    this.write('warn', message, context);
  }

  debug(message: string, context?: string | LogContext): void {
    this.write('debug', message, context);
  }

  verbose(message: string, context?: string | LogContext): void {
    this.write('verbose', message, context);
  }

  logRequest(context: LogContext): void {
    this.write('http', 'HTTP Request', { type: 'request', ...context });
  }

  logResponse(context: LogContext): void {
    this.write('http', 'HTTP Response', { type: 'response', ...context });
  }

  logError(error: Error, context?: LogContext): void {
    this.error(error.message, error.stack, {
      type: 'error',
      errorName: error.name,
      ...context,
    });
  }

  /** Slot bookings, resets and account changes. */
  logBusinessEvent(event: string, data: Record<string, unknown>, context?: LogContext): void {
    this.log(`Business Event: ${event}`, {
      type: 'business_event',
      event,
      data,
      ...context,
    });
  }

  /** Failed logins, role denials and other auth decisions; always at warn. */
  logSecurityEvent(event: string, context: LogContext): void {
    this.warn(`Security Event: ${event}`, {
      type: 'security_event',
      event,
      ...context,
    });
  }

  logPerformance(operation: string, duration: number, context?: LogContext): void {
    this.log(`Performance: ${operation}`, {
      type: 'performance',
      operation,
      duration,
      ...context,
    });
  }

  private write(
    level: string,
    message: string,
    context?: string | LogContext,
    extra: LogContext = {},
  ): void {
    const meta = typeof context === 'string' ? { contextOverride: context } : context;
    this.winston.log(level, message, {
      context: this.context,
      ...extra,
      ...meta,
    });
  }
}
