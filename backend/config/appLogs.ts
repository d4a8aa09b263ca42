/**
 * Application log layer on top of the Winston logger: categorized error events,
 * availability (startup/shutdown) events and security incidents. Everything goes
 * through `logEvent()` so the output schema stays uniform.
 */
import { logEvent, getSystemMetrics, type LogDomain } from './logger.js';

// ═══════════════════════════════════════════════════════════════════════════════
//  ERROR LOGS
// ═══════════════════════════════════════════════════════════════════════════════

export type ErrorCategory =
  | 'VALIDATION'
  | 'EXTRACTION'
  | 'EXTERNAL_SERVICE'
  | 'SYSTEM'
  | 'CONFIGURATION';

export type ErrorSeverity = 'low' | 'medium' | 'high' | 'critical';

export interface ErrorEventPayload {
  category: ErrorCategory;
  severity: ErrorSeverity;
  error?: unknown;
  message: string;
  errorCode?: string;
  /** What was being attempted, e.g. `POST /api/prescriptions/validate`. */
  operation?: string;
  requestId?: string;
  ip?: string;
  method?: string;
  route?: string;
  userFacing?: boolean;
  retryable?: boolean;
  metadata?: Record<string, unknown>;
}

function domainForCategory(category: ErrorCategory): LogDomain {
  switch (category) {
    case 'VALIDATION':
      return 'validation';
    case 'EXTRACTION':
    case 'EXTERNAL_SERVICE':
      return 'extraction';
    default:
      return 'system';
  }
}

export function logErrorEvent(payload: ErrorEventPayload): void {
  const level = payload.severity === 'critical' || payload.severity === 'high' ? 'error' : 'warn';
  const err = payload.error instanceof Error ? payload.error : undefined;

  logEvent(level, payload.message, {
    domain: domainForCategory(payload.category),
    eventCategory: 'error',
    eventName: `ERROR_${payload.category}`,
    errorCode: payload.errorCode,
    stack: err?.stack,
    ip: payload.ip,
    method: payload.method,
    route: payload.route,
    requestId: payload.requestId,
    metadata: {
      category: payload.category,
      severity: payload.severity,
      operation: payload.operation,
      errorName: err?.name,
      userFacing: payload.userFacing,
      retryable: payload.retryable,
      ...payload.metadata,
    },
  });
}

// ═══════════════════════════════════════════════════════════════════════════════
//  AVAILABILITY LOGS
// ═══════════════════════════════════════════════════════════════════════════════

export type AvailabilityEventType =
  | 'APPLICATION_STARTING'
  | 'APPLICATION_READY'
  | 'APPLICATION_SHUTDOWN_START'
  | 'APPLICATION_SHUTDOWN_COMPLETE';

export function logAvailabilityEvent(type: AvailabilityEventType, metadata: Record<string, unknown> = {}): void {
  logEvent('info', `Availability: ${type}`, {
    domain: 'system',
    eventCategory: 'availability',
    eventName: type,
    metadata: {
      uptimeSeconds: Math.round(process.uptime()),
      nodeVersion: process.version,
      ...getSystemMetrics(),
      ...metadata,
    },
  });
}

// ═══════════════════════════════════════════════════════════════════════════════
//  SECURITY INCIDENTS
// ═══════════════════════════════════════════════════════════════════════════════

export type SecurityEventType = 'RATE_LIMIT_HIT' | 'CORS_VIOLATION' | 'BLOCKED_PATTERN';

export interface SecurityEventPayload {
  severity: 'low' | 'medium' | 'high';
  ip?: string;
  route?: string;
  method?: string;
  requestId?: string;
  metadata?: Record<string, unknown>;
}

export function logSecurityIncident(type: SecurityEventType, payload: SecurityEventPayload): void {
  logEvent(payload.severity === 'high' ? 'error' : 'warn', `Security incident: ${type}`, {
    domain: 'security',
    eventCategory: 'security',
    eventName: type,
    ip: payload.ip,
    route: payload.route,
    method: payload.method,
    requestId: payload.requestId,
    metadata: { severity: payload.severity, ...payload.metadata },
  });
}
