/**
 * Entity CRUD routes
 *
 * - POST   /entities      create
 * - GET    /entities      list with optional JSON filters and skip/limit
 * - GET    /entities/:id  read
 * - PUT    /entities/:id  replace created_by and data
 * - DELETE /entities/:id  hard delete
 */

import { Router } from 'express';
import type { EntityService } from '../../entities/EntityService.js';
import { asyncHandler, sendServiceError } from '../middleware/errorHandler.js';
import {
  EntityBodySchema,
  EntityIdParamsSchema,
  ListEntitiesQuerySchema,
  toEntityResponse,
  toListEntitiesQuery,
} from '../schemas.js';

export function createEntityRoutes(service: EntityService): Router {
  const router = Router();

  router.post(
    '/',
    asyncHandler(async (req, res) => {
      const body = EntityBodySchema.parse(req.body);

      const result = await service.createEntity({ createdBy: body.created_by, data: body.data });
      if (!result.ok) {
        sendServiceError(res, result.error);
        return;
      }

      res.json(toEntityResponse(result.value));
    })
  );

  router.get(
    '/',
    asyncHandler(async (req, res) => {
      const query = toListEntitiesQuery(ListEntitiesQuerySchema.parse(req.query));

      const result = await service.listEntities(query);
      if (!result.ok) {
        sendServiceError(res, result.error);
        return;
      }

      res.json(result.value.map(toEntityResponse));
    })
  );

  router.get(
    '/:id',
    asyncHandler(async (req, res) => {
      const { id } = EntityIdParamsSchema.parse(req.params);

      const result = await service.getEntity(id);
      if (!result.ok) {
        sendServiceError(res, result.error);
        return;
      }

      res.json(toEntityResponse(result.value));
    })
  );

  router.put(
    '/:id',
    asyncHandler(async (req, res) => {
      const { id } = EntityIdParamsSchema.parse(req.params);
      const body = EntityBodySchema.parse(req.body);

      const result = await service.updateEntity(id, {
        createdBy: body.created_by,
        data: body.data,
      });
      if (!result.ok) {
        sendServiceError(res, result.error);
        return;
      }

      res.json(toEntityResponse(result.value));
    })
  );

  router.delete(
    '/:id',
    asyncHandler(async (req, res) => {
      const { id } = EntityIdParamsSchema.parse(req.params);

      const result = await service.deleteEntity(id);
      if (!result.ok) {
        sendServiceError(res, result.error);
        return;
      }

      res.json({ ok: true });
    })
  );

  return router;
}
