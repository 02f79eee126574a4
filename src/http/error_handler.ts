import type { NextFunction, Request, Response } from 'express';
import { LifecycleError, LifecycleErrorCode, errorMessage } from '../engine/errors.js';
import { logError } from '../util/logger.js';

const STATUS_BY_CODE: Record<LifecycleErrorCode, number> = {
  VALIDATION_ERROR: 422,
  NOT_FOUND: 404,
  INVALID_TRANSITION: 409,
  INCONSISTENT_REFERENCE: 409,
  PRECONDITION_FAILED: 412,
  STORE_UNAVAILABLE: 503,
};

export function statusForError(err: LifecycleError) {
  return STATUS_BY_CODE[err.code];
}

function isJsonParseError(err: unknown) {
  // body-parser marks malformed JSON as a SyntaxError carrying the raw body.
  return err instanceof SyntaxError && 'body' in err;
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  if (isJsonParseError(err)) {
    return res.status(400).json({ ok: false, error: 'INVALID_JSON', message: 'invalid json' });
  }
  if (err instanceof LifecycleError) {
    return res.status(statusForError(err)).json({ ok: false, error: err.code, message: err.message, details: err.details });
  }
  logError('unhandled error', {
    method: req.method,
    url: req.originalUrl || req.url,
    message: errorMessage(err),
  });
  return res.status(500).json({ ok: false, error: 'INTERNAL', message: errorMessage(err) });
}
