import type { NextFunction, Request, Response } from 'express';
import { z } from 'zod';
import logger from '../config/logger.js';
import { logErrorEvent } from '../config/appLogs.js';

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly details?: unknown;
  public readonly isOperational: boolean;

  constructor(statusCode: number, code: string, message: string, details?: unknown) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
    this.isOperational = true; // expected failure, as opposed to a programming bug
  }
}

export function getRequestId(res: Response): string {
  const fromLocals: unknown = res.locals.requestId;
  if (typeof fromLocals === 'string') return fromLocals.trim();
  const fromHeader = res.getHeader('x-request-id');
  return typeof fromHeader === 'string' ? fromHeader.trim() : '';
}

/** body-parser tags its failures with a `type` such as `entity.parse.failed`. */
function bodyParserErrorType(err: unknown): string | undefined {
  if (err && typeof err === 'object' && 'type' in err && typeof err.type === 'string') return err.type;
  return undefined;
}

export function notFoundHandler(req: Request, res: Response): void {
  const isProd = process.env.NODE_ENV === 'production';
  res.status(404).json({
    error: {
      code: 'NOT_FOUND',
      message: isProd ? 'The requested endpoint does not exist.' : `Route not found: ${req.method} ${req.path}`,
    },
  });
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  const requestId = getRequestId(res);
  const operation = `${req.method} ${req.originalUrl}`;
  const requestContext = { operation, requestId, ip: req.ip, method: req.method, route: req.originalUrl };

  if (res.headersSent) {
    logger.error('Error after headers sent, cannot respond', {
      requestId,
      route: req.originalUrl,
      error: err instanceof Error ? err.message : String(err),
    });
    return;
  }

  if (err instanceof AppError) {
    logErrorEvent({
      category: err.code.startsWith('EXTRACTION_') ? 'EXTRACTION' : 'VALIDATION',
      severity: err.statusCode >= 500 ? 'high' : 'low',
      error: err,
      message: `AppError ${err.statusCode}: ${err.code}: ${err.message}`,
      errorCode: err.code,
      ...requestContext,
      userFacing: true,
      retryable: err.statusCode === 503 || err.statusCode === 429,
    });
    res.status(err.statusCode).json({
      error: {
        code: err.code,
        message: err.message,
        details: err.details,
        ...(requestId ? { requestId } : {}),
      },
    });
    return;
  }

  // Shape errors in a request body are the caller's problem, never a 500.
  if (err instanceof z.ZodError) {
    logErrorEvent({
      category: 'VALIDATION',
      severity: 'low',
      error: err,
      message: `Validation failed: ${err.issues.map((i) => i.path.join('.')).join(', ')}`,
      errorCode: 'ZOD_VALIDATION',
      ...requestContext,
      userFacing: true,
      retryable: false,
    });
    res.status(400).json({
      error: {
        code: 'BAD_REQUEST',
        message: 'Please check your input and try again.',
        details: err.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
      },
    });
    return;
  }

  const parserErrorType = bodyParserErrorType(err);
  if (parserErrorType === 'entity.parse.failed') {
    logErrorEvent({
      category: 'VALIDATION',
      severity: 'low',
      error: err,
      message: 'Malformed JSON in request body',
      errorCode: 'BAD_JSON',
      ...requestContext,
      userFacing: true,
      retryable: false,
    });
    res.status(400).json({
      error: {
        code: 'BAD_JSON',
        message: 'The request body contains invalid JSON. Please check and try again.',
      },
    });
    return;
  }

  if (parserErrorType === 'entity.too.large') {
    logErrorEvent({
      category: 'VALIDATION',
      severity: 'medium',
      error: err,
      message: `Payload too large: ${operation}`,
      errorCode: 'PAYLOAD_TOO_LARGE',
      ...requestContext,
      userFacing: true,
      retryable: false,
    });
    res.status(413).json({
      error: {
        code: 'PAYLOAD_TOO_LARGE',
        message: 'The request body is too large.',
      },
    });
    return;
  }

  logErrorEvent({
    category: 'SYSTEM',
    severity: 'critical',
    error: err instanceof Error ? err : new Error(String(err)),
    message: `Unhandled error: ${err instanceof Error ? err.message : String(err)}`,
    errorCode: 'UNHANDLED',
    ...requestContext,
    userFacing: true,
    retryable: false,
  });

  const isProd = process.env.NODE_ENV === 'production';
  const message =
    isProd || !(err instanceof Error) || !err.message ? 'Something went wrong. Please try again later.' : err.message;
  res.status(500).json({
    error: {
      code: 'INTERNAL_SERVER_ERROR',
      message,
      ...(requestId ? { requestId } : {}),
    },
  });
}
