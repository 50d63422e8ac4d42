/**
 * Shared request/response helpers for the API routes
 */

import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { getAddress, type Address } from 'viem';
import type { z } from 'zod';
import type { MarketError, MarketErrorKind, Result } from '../market/errors.js';
import type { RoundKey } from '../market/types.js';
import { toJsonSafe } from '../utils/formatting.js';
import { RoundParamsSchema, formatIssues, validateAddress } from '../utils/validation.js';

export const CALLER_HEADER = 'x-caller-address';

const STATUS_BY_KIND: Record<MarketErrorKind, number> = {
  authorization: 403,
  'not-found': 404,
  phase: 409,
  validation: 400,
  ledger: 402,
};

/**
 * Forward rejected handler promises to the error middleware
 */
export function asyncHandler(
  handler: (req: Request, res: Response) => Promise<void>
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}

export function sendError(res: Response, error: MarketError): void {
  res.status(STATUS_BY_KIND[error.kind]).json({
    error: error.code,
    code: error.numericCode,
    message: error.message,
  });
}

export function sendResult<T>(res: Response, result: Result<T>, status: number = 200): void {
  if (!result.ok) {
    sendError(res, result.error);
    return;
  }
  res.status(status).json(toJsonSafe(result.value));
}

export function sendInvalid(res: Response, errors: string[]): void {
  res.status(400).json({ error: 'ValidationError', message: 'Invalid request', details: errors });
}

/**
 * Parse `input` with `schema`, answering 400 on failure
 */
export function parseOr400<S extends z.ZodTypeAny>(res: Response, schema: S, input: unknown): z.output<S> | null {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    sendInvalid(res, formatIssues(parsed.error));
    return null;
  }
  return parsed.data;
}

/**
 * Caller identity from the x-caller-address header, answering 401 when absent
 */
export function requireCaller(req: Request, res: Response): Address | null {
  const header = req.header(CALLER_HEADER);
  const check = validateAddress(header);
  if (!check.valid || !header) {
    res.status(401).json({ error: 'Unauthorized', message: check.errors.join(', ') });
    return null;
  }
  return getAddress(header);
}

export function parseRoundParams(req: Request, res: Response): RoundKey | null {
  return parseOr400(res, RoundParamsSchema, req.params);
}
