import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { DomainError } from '../domain/errors.js';
import { formatZodError } from '../domain/validation.js';
import { logger } from '../logger.js';

const STATUS_BY_CODE: Record<DomainError['code'], number> = {
  invalid_input: 400,
  not_found: 404,
  duplicate_name: 409,
  optimization_aborted: 503,
  optimization_timeout: 503,
};

export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  next: NextFunction
) {
  if (!err) return next();

  const requestId = typeof res.locals.requestId === 'string' ? res.locals.requestId : undefined;

  if (err instanceof z.ZodError) {
    const detail = formatZodError(err);
    logger.warn({ requestId, error: 'invalid_input', detail }, 'request rejected');
    return res.status(400).json({ error: 'invalid_input', detail });
  }

  // Malformed JSON bodies surface from express.json() as SyntaxError
  if (err instanceof SyntaxError) {
    logger.warn({ requestId, error: 'invalid_input', detail: err.message }, 'request rejected');
    return res.status(400).json({ error: 'invalid_input', detail: 'Malformed JSON body' });
  }

  if (err instanceof DomainError) {
    const status = STATUS_BY_CODE[err.code];
    if (status < 500) {
      logger.warn({ requestId, error: err.code, detail: err.detail }, 'request rejected');
    } else {
      logger.error({ requestId, error: err.code, detail: err.detail }, 'request failed');
    }
    return res.status(status).json({ error: err.code, detail: err.detail });
  }

  logger.error({ requestId, err }, 'unexpected error');
  return res.status(500).json({
    error: 'internal_error',
    detail: 'An unexpected error occurred',
  });
}
