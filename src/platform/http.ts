// ──────────────────────────────────────────
// Platform: response envelope + error mapping for Express routes
// ──────────────────────────────────────────

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { AppError, ErrorCode } from '../shared/errors';

export interface Envelope<T> {
  success: boolean;
  timestamp: string;
  country?: string;
  data?: T;
  error?: { code: ErrorCode; message: string };
}

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  NOT_FOUND: 404,
  INVALID_ARGUMENT: 400,
  VALIDATION: 422,
  UPSTREAM_ERROR: 502,
  NOT_CONFIGURED: 503,
  INTERNAL: 500,
};

export function sendOk<T>(res: Response, data: T, country?: string): void {
  const body: Envelope<T> = { success: true, timestamp: new Date().toISOString(), data };
  if (country) body.country = country;
  res.json(body);
}

export function sendError(res: Response, err: unknown, country?: string): void {
  const code: ErrorCode = err instanceof AppError ? err.code : 'INTERNAL';
  const message = err instanceof AppError ? err.message : 'Internal error';
  if (code === 'INTERNAL') {
    console.error('[Http] Unhandled error:', err instanceof Error ? err.message : String(err));
  }

  const body: Envelope<never> = {
    success: false,
    timestamp: new Date().toISOString(),
    error: { code, message },
  };
  if (country) body.country = country;
  res.status(STATUS_BY_CODE[code]).json(body);
}

/** Wraps an async handler; a rejection is answered with the error envelope. */
export function route(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req: Request, res: Response, _next: NextFunction) => {
    handler(req, res).catch((err: unknown) => sendError(res, err, queryString(req, 'country')?.toUpperCase()));
  };
}

/** First value of a query parameter, or undefined when absent or empty. */
export function queryString(req: Request, name: string): string | undefined {
  const raw = req.query[name];
  const value = Array.isArray(raw) ? raw[0] : raw;
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined;
}

export function queryNumber(req: Request, name: string): number | undefined {
  const value = queryString(req, name);
  return value === undefined ? undefined : Number(value);
}

export function queryList(req: Request, name: string): string[] {
  const value = queryString(req, name);
  return value ? value.split(',').map((s) => s.trim()).filter((s) => s.length > 0) : [];
}
