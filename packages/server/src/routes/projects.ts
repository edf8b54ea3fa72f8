/**
 * Project Routes
 *
 * Projects owned by the caller and the ordered specifications inside them.
 */

import { Router } from 'express';
import {
  ChildCreateSchema,
  ProjectCreateSchema,
  ProjectListQuerySchema,
  ProjectUpdateSchema,
  ReorderSchema,
  parseOrThrow,
} from '@specnest/core';
import type { AppContext } from '../context.js';
import { currentUser, requireAuth } from '../middleware/authenticate.js';
import { cacheHeader, idParam } from './params.js';

export default function createProjectsRouter(context: AppContext): Router {
  const router = Router();
  const { projects, specifications } = context;

  router.use(requireAuth());

  /**
   * GET /api/v1/projects?page&pageSize&sort
   */
  router.get('/', async (req, res, next) => {
    try {
      const query = parseOrThrow(ProjectListQuerySchema, req.query);
      res.json(await projects.list(currentUser(req).sub, query, cacheHeader(res)));
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/v1/projects
   * Body: { title }
   */
  router.post('/', async (req, res, next) => {
    try {
      const { title } = parseOrThrow(ProjectCreateSchema, req.body);
      const project = await projects.create(currentUser(req).sub, title);
      res.status(201).json({ project });
    } catch (error) {
      next(error);
    }
  });

  router.get('/:projectId', async (req, res, next) => {
    try {
      const project = await projects.get(currentUser(req).sub, idParam(req, 'projectId'));
      res.json({ project });
    } catch (error) {
      next(error);
    }
  });

  router.put('/:projectId', async (req, res, next) => {
    try {
      const projectId = idParam(req, 'projectId');
      const { title } = parseOrThrow(ProjectUpdateSchema, req.body);
      const project = await projects.update(currentUser(req).sub, projectId, title);
      res.json({ project });
    } catch (error) {
      next(error);
    }
  });

  /**
   * DELETE /api/v1/projects/:projectId
   * Cascades to specifications and their items.
   */
  router.delete('/:projectId', async (req, res, next) => {
    try {
      await projects.remove(currentUser(req).sub, idParam(req, 'projectId'));
      res.status(204).end();
    } catch (error) {
      next(error);
    }
  });

  router.get('/:projectId/specifications', async (req, res, next) => {
    try {
      const list = await specifications.list(currentUser(req).sub, idParam(req, 'projectId'), cacheHeader(res));
      res.json({ specifications: list });
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/v1/projects/:projectId/specifications
   * Body: { content, position? } - appends when position is omitted
   */
  router.post('/:projectId/specifications', async (req, res, next) => {
    try {
      const projectId = idParam(req, 'projectId');
      const input = parseOrThrow(ChildCreateSchema, req.body);
      const specification = await specifications.create(currentUser(req).sub, projectId, input);
      res.status(201).json({ specification });
    } catch (error) {
      next(error);
    }
  });

  /**
   * PUT /api/v1/projects/:projectId/specifications/order
   * Body: { moves: [{ id, orderIndex }] }
   */
  router.put('/:projectId/specifications/order', async (req, res, next) => {
    try {
      const projectId = idParam(req, 'projectId');
      const { moves } = parseOrThrow(ReorderSchema, req.body);
      const list = await specifications.reorder(currentUser(req).sub, projectId, moves);
      res.json({ specifications: list });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
