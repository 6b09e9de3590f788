import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { ZodError } from 'zod';
import {
  EntityNotFoundError,
  EntityStorageError,
  FilterValidationError,
} from '../../entities/errors.js';
import { logger } from '../../utils/logger.js';

/**
 * Forward rejections from async route handlers to the error middleware.
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
}

/**
 * Map a service error to its HTTP status and JSON body.
 */
export function sendServiceError(
  res: Response,
  error: EntityNotFoundError | FilterValidationError | EntityStorageError
): void {
  if (error instanceof EntityNotFoundError) {
    res.status(404).json({ detail: error.message });
    return;
  }

  if (error instanceof FilterValidationError) {
    res.status(400).json({ detail: error.message, code: error.code, parameter: error.parameter });
    return;
  }

  logger.error('Storage failure', { error, diagnostics: error.diagnostics });
  res.status(500).json({ detail: 'Internal server error' });
}

export function notFoundHandler(_req: Request, res: Response): void {
  res.status(404).json({ detail: 'Not Found' });
}

function httpStatusOf(error: unknown): number | undefined {
  if (error && typeof error === 'object') {
    if ('status' in error && typeof error.status === 'number') {
      return error.status;
    }
    if ('statusCode' in error && typeof error.statusCode === 'number') {
      return error.statusCode;
    }
  }
  return undefined;
}

function isJsonParseFailure(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'type' in error &&
    error.type === 'entity.parse.failed'
  );
}

/**
 * Terminal error middleware. Express recognises it by its four parameters.
 */
export function errorHandler(
  error: unknown,
  req: Request,
  res: Response,
  next: NextFunction
): void {
  if (res.headersSent) {
    next(error);
    return;
  }

  if (error instanceof ZodError) {
    res.status(400).json({
      detail: 'Invalid request',
      errors: error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    });
    return;
  }

  if (
    error instanceof EntityNotFoundError ||
    error instanceof FilterValidationError ||
    error instanceof EntityStorageError
  ) {
    sendServiceError(res, error);
    return;
  }

  // body-parser errors carry their own 4xx status
  const status = httpStatusOf(error);
  if (status !== undefined && status >= 400 && status < 500) {
    if (isJsonParseFailure(error)) {
      res.status(400).json({ detail: 'Malformed JSON body' });
      return;
    }
    res.status(status).json({ detail: error instanceof Error ? error.message : 'Bad request' });
    return;
  }

  logger.error('Unhandled request error', { method: req.method, path: req.path, error });
  res.status(500).json({ detail: 'Internal server error' });
}
