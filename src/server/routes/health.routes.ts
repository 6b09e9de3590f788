import { Router } from 'express';
import type { EntityService } from '../../entities/EntityService.js';
import { logger } from '../../utils/logger.js';
import { asyncHandler } from '../middleware/errorHandler.js';

/**
 * GET /health: 200 when a trivial query succeeds, 503 otherwise.
 */
export function createHealthRoutes(service: EntityService): Router {
  const router = Router();

  router.get(
    '/',
    asyncHandler(async (_req, res) => {
      const result = await service.checkHealth();
      if (!result.ok) {
        logger.warn('Health check failed', {
          error: result.error.message,
          diagnostics: result.error.diagnostics,
        });
        res.status(503).json({ status: 'unavailable' });
        return;
      }

      res.json({ status: 'ok' });
    })
  );

  return router;
}
