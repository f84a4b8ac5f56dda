/**
 * API middleware: raw body capture, error mapping and the shared error
 * response helper used by the route handlers.
 */

import { IncomingMessage } from 'http';
import { Request, Response, NextFunction } from 'express';
import { ShipwrightError, TypedError, apiError, createTypedError, toTypedError } from '../domain/errors';
import { logger } from '../logger';

const log = logger.child({ component: 'api' });

/** Raw request bodies, kept for signature verification. */
const rawBodies = new WeakMap<IncomingMessage, Buffer>();

/** `verify` hook for express.json that remembers the unparsed body. */
export function captureRawBody(req: IncomingMessage, _res: unknown, buf: Buffer): void {
  rawBodies.set(req, buf);
}

export function rawBodyOf(req: IncomingMessage): Buffer | undefined {
  return rawBodies.get(req);
}

export function getHttpStatus(error: TypedError): number {
  if (error.code === 'AUTH.UNAUTHENTICATED' || error.code === 'AUTH.INVALID_SIGNATURE') return 401;
  if (error.code.startsWith('AUTH.')) return 403;
  if (error.code.includes('NOT_FOUND')) return 404;
  if (error.code.startsWith('VALIDATION.')) return 400;
  if (error.code.startsWith('RUN.INVALID') || error.code === 'RUN.ALREADY_RUNNING') return 409;
  if (error.code.startsWith('PLAN.')) return 422;
  return 500;
}

/** Respond with the TypedError carried by `err`, or a SYSTEM.INTERNAL one. */
export function sendError(res: Response, err: unknown, fallbackMessage: string): void {
  if (err instanceof ShipwrightError) {
    const status = getHttpStatus(err.typedError);
    log.warn('Request error', { code: err.typedError.code, status });
    res.status(status).json(apiError(err.typedError));
    return;
  }
  log.error('Unhandled request error', {
    message: err instanceof Error ? err.message : String(err),
    stack: err instanceof Error ? err.stack : undefined,
  });
  const typedError = toTypedError(err);
  res.status(500).json(apiError({ ...typedError, message: typedError.message || fallbackMessage }));
}

/** Global error handling middleware. */
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof SyntaxError) {
    res.status(400).json(apiError(createTypedError({
      code: 'VALIDATION.MALFORMED_BODY',
      message: 'Request body is not valid JSON',
    })));
    return;
  }
  sendError(res, err, 'Internal server error');
}

/** Parse a non-negative integer query parameter. */
export function intQuery(value: unknown, fallback: number, max = Number.MAX_SAFE_INTEGER): number {
  if (typeof value !== 'string') return fallback;
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 0) return fallback;
  return Math.min(parsed, max);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** A string-to-string map from a request body field, or undefined when absent or malformed. */
export function stringMap(value: unknown): Record<string, string> | undefined {
  if (!isRecord(value)) return undefined;
  const result: Record<string, string> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry === 'string') result[key] = entry;
  }
  return result;
}
