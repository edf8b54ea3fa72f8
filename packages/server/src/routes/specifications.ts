/**
 * Specification Routes
 *
 * Moving and deleting a single specification, and the items inside it.
 */

import { Router } from 'express';
import { ChildCreateSchema, MoveSchema, ReorderSchema, parseOrThrow } from '@specnest/core';
import type { AppContext } from '../context.js';
import { currentUser, requireAuth } from '../middleware/authenticate.js';
import { cacheHeader, idParam } from './params.js';

export default function createSpecificationsRouter(context: AppContext): Router {
  const router = Router();
  const { specifications, items } = context;

  router.use(requireAuth());

  /**
   * PUT /api/v1/specifications/:specId/order
   * Body: { orderIndex }
   */
  router.put('/:specId/order', async (req, res, next) => {
    try {
      const specId = idParam(req, 'specId');
      const { orderIndex } = parseOrThrow(MoveSchema, req.body);
      const list = await specifications.move(currentUser(req).sub, specId, orderIndex);
      res.json({ specifications: list });
    } catch (error) {
      next(error);
    }
  });

  router.delete('/:specId', async (req, res, next) => {
    try {
      await specifications.remove(currentUser(req).sub, idParam(req, 'specId'));
      res.status(204).end();
    } catch (error) {
      next(error);
    }
  });

  router.get('/:specId/items', async (req, res, next) => {
    try {
      const list = await items.list(currentUser(req).sub, idParam(req, 'specId'), cacheHeader(res));
      res.json({ items: list });
    } catch (error) {
      next(error);
    }
  });

  router.post('/:specId/items', async (req, res, next) => {
    try {
      const specId = idParam(req, 'specId');
      const input = parseOrThrow(ChildCreateSchema, req.body);
      const item = await items.create(currentUser(req).sub, specId, input);
      res.status(201).json({ item });
    } catch (error) {
      next(error);
    }
  });

  router.put('/:specId/items/order', async (req, res, next) => {
    try {
      const specId = idParam(req, 'specId');
      const { moves } = parseOrThrow(ReorderSchema, req.body);
      const list = await items.reorder(currentUser(req).sub, specId, moves);
      res.json({ items: list });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
