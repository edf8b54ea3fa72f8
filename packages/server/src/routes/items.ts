import { Router } from 'express';
import { ChildUpdateSchema, parseOrThrow } from '@specnest/core';
import type { AppContext } from '../context.js';
import { currentUser, requireAuth } from '../middleware/authenticate.js';
import { idParam } from './params.js';

export default function createItemsRouter(context: AppContext): Router {
  const router = Router();
  const { items } = context;

  router.use(requireAuth());

  /**
   * PUT /api/v1/items/:itemId
   * Body: { content } - order is untouched
   */
  router.put('/:itemId', async (req, res, next) => {
    try {
      const itemId = idParam(req, 'itemId');
      const { content } = parseOrThrow(ChildUpdateSchema, req.body);
      const item = await items.update(currentUser(req).sub, itemId, content);
      res.json({ item });
    } catch (error) {
      next(error);
    }
  });

  router.delete('/:itemId', async (req, res, next) => {
    try {
      await items.remove(currentUser(req).sub, idParam(req, 'itemId'));
      res.status(204).end();
    } catch (error) {
      next(error);
    }
  });

  return router;
}
