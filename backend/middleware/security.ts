/**
 * Request hardening that sits next to Helmet: request ids for log correlation
 * and blocking of control characters / traversal sequences in request data.
 */
import crypto from 'node:crypto';
import type { NextFunction, Request, Response } from 'express';
import { securityLog } from '../config/logger.js';
import { logSecurityIncident } from '../config/appLogs.js';

// Client-provided ids are echoed only when they cannot smuggle CRLF into logs.
const REQUEST_ID_PATTERN = /^[a-zA-Z0-9._-]{1,128}$/;

export function requestIdMiddleware() {
  return (req: Request, res: Response, next: NextFunction) => {
    const provided = String(req.header('x-request-id') || '').trim();
    const requestId = provided && REQUEST_ID_PATTERN.test(provided) ? provided : crypto.randomUUID();
    res.setHeader('x-request-id', requestId);
    res.locals.requestId = requestId;
    next();
  };
}

const BLOCK_PATTERNS = [
  /(\.\.[/\\]){2,}/, // path traversal
  /[\x00\x1a\x7f]/, // null byte and friends
];

function findBlockedPattern(value: unknown, depth = 0): string | null {
  if (depth > 6) return null;
  if (typeof value === 'string') {
    const hit = BLOCK_PATTERNS.find((pattern) => pattern.test(value));
    return hit ? hit.source : null;
  }
  if (Array.isArray(value)) {
    for (const item of value) {
      const match = findBlockedPattern(item, depth + 1);
      if (match) return match;
    }
    return null;
  }
  if (value && typeof value === 'object') {
    for (const entry of Object.values(value)) {
      const match = findBlockedPattern(entry, depth + 1);
      if (match) return match;
    }
  }
  return null;
}

/**
 * Rejects requests whose query or body carry unambiguously hostile strings.
 * Must run after the body parsers.
 */
export function securityAuditMiddleware() {
  return (req: Request, res: Response, next: NextFunction) => {
    const sources: Array<{ data: unknown; label: string }> = [
      { data: req.query, label: 'query' },
      { data: req.body, label: 'body' },
    ];

    for (const source of sources) {
      const pattern = findBlockedPattern(source.data);
      if (!pattern) continue;

      const requestId = String(res.locals.requestId || '');
      securityLog.warn('Blocked malicious request pattern', {
        requestId,
        pattern,
        location: source.label,
        ip: req.ip,
        method: req.method,
        url: req.originalUrl,
      });
      logSecurityIncident('BLOCKED_PATTERN', {
        severity: 'medium',
        ip: req.ip,
        route: req.originalUrl,
        method: req.method,
        requestId,
        metadata: { location: source.label },
      });
      res.status(400).json({
        error: {
          code: 'BAD_REQUEST',
          message: 'The request contains invalid characters.',
        },
      });
      return;
    }

    next();
  };
}
