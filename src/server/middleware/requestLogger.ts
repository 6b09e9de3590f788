import type { NextFunction, Request, Response } from 'express';
import { debugLog, logger } from '../../utils/logger.js';

/**
 * Log each request once the response finishes: a debug line always, and an
 * `http-request` metric when `timing` is on.
 */
export function requestLogger(timing: boolean) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const start = Date.now();

    res.on('finish', () => {
      const durationMs = Date.now() - start;
      const entry = { method: req.method, path: req.path, status: res.statusCode, durationMs };

      debugLog('request', `${req.method} ${req.path} -> ${res.statusCode}`, entry);
      if (timing) {
        logger.metric('http-request', entry);
      }
    });

    next();
  };
}
