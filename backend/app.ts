import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';

import type { Env } from './config/env.js';
import { parseCorsOrigins, policyFromEnv } from './config/env.js';
import { httpLog, logEvent } from './config/logger.js';
import { logSecurityIncident } from './config/appLogs.js';
import { healthRoutes } from './routes/healthRoutes.js';
import { prescriptionRoutes } from './routes/prescriptionRoutes.js';
import { errorHandler, notFoundHandler } from './middleware/errors.js';
import { requestIdMiddleware, securityAuditMiddleware } from './middleware/security.js';
import { ValidationEngine } from './services/validation/validationEngine.js';

export function isOriginAllowed(origin: string, allowed: string[]): boolean {
  if (!origin) return true;
  if (!allowed.length) return true;
  if (allowed.includes('*')) return true;

  let originHost: string;
  try {
    originHost = new URL(origin).hostname;
  } catch {
    // An Origin that is not a URL never matches.
    return false;
  }

  return allowed.some((entry) => {
    if (entry === origin) return true;
    if (entry.includes('*')) {
      const escaped = entry.replace(/[.+?^${}()|[\]\\]/g, '\\$&').replace(/\*/g, '.*');
      const re = new RegExp(`^${escaped}$`);
      return re.test(origin) || re.test(originHost);
    }
    // ".example.com" allows any subdomain; a bare hostname must match exactly.
    if (entry.startsWith('.')) return originHost.endsWith(entry);
    return originHost === entry;
  });
}

export interface AppOptions {
  engine?: ValidationEngine;
}

export function createApp(env: Env, options: AppOptions = {}) {
  const app = express();
  const engine = options.engine ?? new ValidationEngine({ policy: policyFromEnv(env) });

  app.disable('x-powered-by');
  app.set('trust proxy', 1);

  app.use(requestIdMiddleware());

  // Request log line per response; Winston is silent under NODE_ENV=test.
  app.use((req, res, next) => {
    const start = Date.now();
    res.on('finish', () => {
      const status = res.statusCode;
      logEvent(status >= 500 ? 'error' : status >= 400 ? 'warn' : 'info', `${req.method} ${req.originalUrl} -> ${status}`, {
        domain: 'http',
        eventName: 'REQUEST_COMPLETED',
        requestId: String(res.locals.requestId || ''),
        method: req.method,
        route: req.originalUrl,
        statusCode: status,
        duration: Date.now() - start,
        ip: req.ip,
        metadata: { contentLength: res.get('content-length') },
      });
    });
    next();
  });

  // API only: no CSP needed, HSTS only where TLS terminates in production.
  app.use(
    helmet({
      contentSecurityPolicy: false,
      crossOriginEmbedderPolicy: false,
      hsts: env.NODE_ENV === 'production' ? { maxAge: 31_536_000, includeSubDomains: true } : false,
      referrerPolicy: { policy: 'strict-origin-when-cross-origin' },
    })
  );
  app.use((_req, res, next) => {
    // Prescription data must not sit in intermediary caches.
    res.setHeader('Cache-Control', 'no-store');
    next();
  });

  app.use(
    rateLimit({
      windowMs: 60_000,
      limit: env.RATE_LIMIT_PER_MINUTE,
      standardHeaders: true,
      legacyHeaders: false,
      handler: (req, res) => {
        httpLog.warn('Rate limit exceeded', { ip: req.ip });
        logSecurityIncident('RATE_LIMIT_HIT', {
          severity: 'medium',
          ip: req.ip,
          route: req.originalUrl,
          method: req.method,
          requestId: String(res.locals.requestId || ''),
        });
        res.setHeader('Retry-After', '60');
        res.status(429).json({
          error: { code: 'RATE_LIMITED', message: 'Too many requests. Please wait a moment and try again.' },
        });
      },
    })
  );

  const corsOrigins = parseCorsOrigins(env.CORS_ORIGINS);

  // A disallowed Origin is refused outright instead of merely missing CORS headers.
  app.use((req, res, next) => {
    const origin = req.header('origin');
    if (origin && !isOriginAllowed(origin, corsOrigins)) {
      logSecurityIncident('CORS_VIOLATION', {
        severity: 'medium',
        ip: req.ip,
        route: req.originalUrl,
        method: req.method,
        requestId: String(res.locals.requestId || ''),
        metadata: { origin },
      });
      res.status(403).json({ error: { code: 'ORIGIN_NOT_ALLOWED', message: 'Origin not allowed.' } });
      return;
    }
    next();
  });
  app.use(
    cors({
      origin: (origin, cb) => cb(null, isOriginAllowed(String(origin || ''), corsOrigins)),
      optionsSuccessStatus: 204,
    })
  );

  app.use(express.json({ limit: env.REQUEST_BODY_LIMIT }));
  app.use(securityAuditMiddleware());

  app.use('/api', healthRoutes());
  app.use('/api', prescriptionRoutes(engine));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
