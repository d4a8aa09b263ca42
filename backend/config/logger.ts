/**
 * Structured logging for the prescription validation service, built on Winston.
 *
 * - Colourised console output in development, JSON lines in production
 * - Daily rotated combined/error files in production (winston-daily-rotate-file)
 * - Silent under NODE_ENV=test
 * - Redaction of secret-looking keys, depth/size limits, circular reference guard
 * - Throttling of repeated warn/error messages
 * - Module-scoped child loggers
 *
 * Log domains: http | system | validation | extraction | security
 */
import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'node:path';
import os from 'node:os';
import { fileURLToPath } from 'node:url';

const { combine, timestamp, printf, errors, json, metadata } = winston.format;

// ─── Constants ───────────────────────────────────────────────────────────────
const SERVICE_NAME = 'rx-validation-service';
const SERVICE_VERSION = process.env.npm_package_version || '0.1.0';
const HOSTNAME = os.hostname();
const __dirname = path.dirname(fileURLToPath(import.meta.url));
const LOG_DIR = process.env.LOG_DIR || path.resolve(__dirname, '..', '..', 'logs');
const nodeEnv = process.env.NODE_ENV || 'development';
const isTest = nodeEnv === 'test';
const isProd = nodeEnv === 'production';

const MAX_STRING_LENGTH = 4096;
const MAX_SERIALIZE_DEPTH = 6;
const MAX_ARRAY_ITEMS = 50;

// ─── Redaction ───────────────────────────────────────────────────────────────
const REDACTED = '[REDACTED]';
const SENSITIVE_KEYS = new Set([
  'password', 'secret', 'token', 'accesstoken', 'authorization', 'cookie', 'setcookie',
  'apikey', 'apisecret', 'privatekey', 'geminiapikey', 'openaiapikey',
]);

function isSensitiveKey(key: string): boolean {
  return SENSITIVE_KEYS.has(key.toLowerCase().replace(/[-_]/g, ''));
}

/**
 * Deep-copies a log payload, replacing secret-looking keys and truncating
 * oversized strings and arrays. Safe on circular structures.
 */
function sanitize(value: unknown, depth = 0, seen = new WeakSet<object>()): unknown {
  if (depth > MAX_SERIALIZE_DEPTH) return '[MAX_DEPTH]';
  if (value === null || value === undefined) return value;

  if (typeof value === 'string') {
    if (value.length <= MAX_STRING_LENGTH) return value;
    return `${value.slice(0, MAX_STRING_LENGTH)}...[truncated ${value.length - MAX_STRING_LENGTH} chars]`;
  }
  if (typeof value !== 'object') return value;

  if (seen.has(value)) return '[CIRCULAR]';
  seen.add(value);

  if (value instanceof Error) {
    return { name: value.name, message: value.message, stack: value.stack };
  }

  if (Array.isArray(value)) {
    const items = value.slice(0, MAX_ARRAY_ITEMS).map((item) => sanitize(item, depth + 1, seen));
    if (value.length > MAX_ARRAY_ITEMS) items.push(`...[${value.length - MAX_ARRAY_ITEMS} more items]`);
    return items;
  }

  const result: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    result[key] = isSensitiveKey(key) ? REDACTED : sanitize(entry, depth + 1, seen);
  }
  return result;
}

function getSystemMetrics() {
  const mem = process.memoryUsage();
  return {
    memoryMB: Math.round(mem.rss / 1024 / 1024),
    heapUsedMB: Math.round(mem.heapUsed / 1024 / 1024),
  };
}

// ─── Log storm protection ────────────────────────────────────────────────────
const throttleMap = new Map<string, { count: number; windowStart: number }>();
const THROTTLE_WINDOW_MS = 60_000;
const THROTTLE_MAX_PER_WINDOW = 10;

function throttleState(message: string): { throttled: boolean; suppressed: number } {
  const now = Date.now();
  const key = message.slice(0, 200);
  const entry = throttleMap.get(key);

  if (!entry || now - entry.windowStart > THROTTLE_WINDOW_MS) {
    throttleMap.set(key, { count: 1, windowStart: now });
    return { throttled: false, suppressed: 0 };
  }

  entry.count++;
  if (entry.count <= THROTTLE_MAX_PER_WINDOW) return { throttled: false, suppressed: 0 };
  return { throttled: true, suppressed: entry.count - THROTTLE_MAX_PER_WINDOW };
}

const throttleSweep = setInterval(() => {
  const now = Date.now();
  for (const [key, entry] of throttleMap) {
    if (now - entry.windowStart > THROTTLE_WINDOW_MS * 2) throttleMap.delete(key);
  }
}, 5 * 60_000);
throttleSweep.unref();

// ─── Formats ─────────────────────────────────────────────────────────────────
const redactFormat = winston.format((info) => {
  if (info.metadata && typeof info.metadata === 'object') {
    const cleaned = sanitize(info.metadata);
    info.metadata = cleaned && typeof cleaned === 'object' ? cleaned : {};
  }
  return info;
});

const enrichFormat = winston.format((info) => {
  info.serviceName = SERVICE_NAME;
  info.environment = nodeEnv;
  info.version = SERVICE_VERSION;
  info.hostname = HOSTNAME;
  info.pid = process.pid;
  return info;
});

const throttleFormat = winston.format((info) => {
  if (info.level !== 'error' && info.level !== 'warn') return info;
  const { throttled, suppressed } = throttleState(String(info.message));
  if (!throttled) return info;
  if (suppressed % 100 === 0) {
    info.message = `[THROTTLED x${suppressed}] ${String(info.message)}`;
    return info;
  }
  return false;
});

const levelColors: Record<string, string> = {
  error: '\x1b[31m',
  warn: '\x1b[33m',
  info: '\x1b[36m',
  http: '\x1b[35m',
  debug: '\x1b[90m',
};
const reset = '\x1b[0m';
const bold = '\x1b[1m';
const dim = '\x1b[2m';
const HIDDEN_META_KEYS = ['module', 'requestId', 'durationMs', 'domain', 'eventName', 'service', 'pid'];

const devFormat = printf((info) => {
  const color = levelColors[info.level] ?? '';
  const tag = typeof info.module === 'string' ? `${dim}[${info.module}]${reset} ` : '';
  const reqId = typeof info.requestId === 'string' ? `${dim}(${info.requestId.slice(0, 8)})${reset} ` : '';
  const dur = typeof info.durationMs === 'number' ? ` ${dim}${info.durationMs}ms${reset}` : '';
  const evt = typeof info.eventName === 'string' ? ` ${dim}«${info.eventName}»${reset}` : '';

  const meta: Record<string, unknown> =
    info.metadata && typeof info.metadata === 'object' ? { ...info.metadata } : {};
  for (const key of HIDDEN_META_KEYS) delete meta[key];
  const extra = Object.keys(meta).length
    ? `\n  ${dim}${JSON.stringify(meta, null, 2).replace(/\n/g, '\n  ')}${reset}`
    : '';

  return `${dim}${String(info.timestamp)}${reset} ${color}${bold}${info.level.toUpperCase().padEnd(5)}${reset} ${tag}${reqId}${String(info.message)}${evt}${dur}${extra}`;
});

const prodJsonFormat = combine(
  timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
  errors({ stack: true }),
  metadata({ fillExcept: ['message', 'level', 'timestamp', 'module', 'requestId', 'domain', 'eventName'] }),
  enrichFormat(),
  redactFormat(),
  throttleFormat(),
  json()
);

const devConsoleFormat = combine(
  timestamp({ format: 'HH:mm:ss.SSS' }),
  errors({ stack: true }),
  metadata({ fillExcept: ['message', 'level', 'timestamp', 'module', 'requestId', 'durationMs', 'domain', 'eventName'] }),
  redactFormat(),
  throttleFormat(),
  devFormat
);

// ─── Transports ──────────────────────────────────────────────────────────────
const transports: winston.transport[] = [
  new winston.transports.Console({ format: isProd ? prodJsonFormat : devConsoleFormat }),
];

if (isProd) {
  transports.push(
    new DailyRotateFile({
      dirname: LOG_DIR,
      filename: 'combined-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      maxSize: '20m',
      maxFiles: '30d',
      format: prodJsonFormat,
      zippedArchive: true,
    }),
    new DailyRotateFile({
      dirname: LOG_DIR,
      filename: 'error-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      level: 'error',
      maxSize: '20m',
      maxFiles: '90d',
      format: prodJsonFormat,
      zippedArchive: true,
    })
  );
}

const logger = winston.createLogger({
  level: isProd ? 'info' : 'debug',
  silent: isTest,
  defaultMeta: { service: SERVICE_NAME },
  transports,
  exitOnError: false,
});

export default logger;

// ─── Structured events ───────────────────────────────────────────────────────

export type LogDomain = 'http' | 'system' | 'validation' | 'extraction' | 'security';

export interface LogEvent {
  domain: LogDomain;
  eventName: string;
  eventCategory?: string;
  requestId?: string;
  correlationId?: string;
  ip?: string;
  method?: string;
  route?: string;
  statusCode?: number;
  duration?: number;
  errorCode?: string;
  stack?: string;
  metadata?: Record<string, unknown>;
}

export function logEvent(level: 'debug' | 'info' | 'warn' | 'error', message: string, event: LogEvent): void {
  const metrics = level === 'error' || level === 'warn' ? getSystemMetrics() : {};
  logger.log(level, message, {
    domain: event.domain,
    eventName: event.eventName,
    eventCategory: event.eventCategory,
    requestId: event.requestId,
    correlationId: event.correlationId,
    ip: event.ip,
    method: event.method,
    route: event.route,
    statusCode: event.statusCode,
    durationMs: event.duration,
    errorCode: event.errorCode,
    stack: event.stack,
    ...metrics,
    ...event.metadata,
  });
}

export const httpLog = logger.child({ module: 'http' });
export const startupLog = logger.child({ module: 'startup' });
export const validationLog = logger.child({ module: 'validation' });
export const extractionLog = logger.child({ module: 'extraction' });
export const securityLog = logger.child({ module: 'security' });

export { sanitize, getSystemMetrics };
