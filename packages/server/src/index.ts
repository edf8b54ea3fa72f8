/**
 * Specnest API Server
 *
 * Express application serving projects, their ordered specifications and
 * the items inside each specification under /api/v1.
 */

import express from 'express';
import cors from 'cors';
import type { Server } from 'http';
import { API_VERSION, APP_VERSION, logger } from '@specnest/core';
import type { Settings } from '@specnest/core';

import { closeContext, createContext } from './context.js';
import type { AppContext, ContextOverrides } from './context.js';
import { identify } from './middleware/authenticate.js';
import { errorHandler, notFoundHandler } from './middleware/error-handler.js';
import { rateLimit, userOrIp } from './middleware/rate-limit.js';
import { requestId } from './middleware/request-id.js';
import { requestLogger } from './middleware/request-logger.js';
import { securityHeaders } from './middleware/security-headers.js';
import createHealthRouter from './routes/health.js';
import createItemsRouter from './routes/items.js';
import createProjectsRouter from './routes/projects.js';
import createSpecificationsRouter from './routes/specifications.js';
import createUsersRouter from './routes/users.js';

export { createContext, closeContext } from './context.js';
export type { AppContext, ContextOverrides } from './context.js';

const log = logger.scoped('server');

const BASE_PATH = `/api/${API_VERSION}`;
const HEALTH_PATH = `${BASE_PATH}/health`;

export interface ServerOptions {
  settings: Settings;
  /** Prebuilt context; created from settings when omitted */
  context?: AppContext;
  overrides?: ContextOverrides;
}

export function createServer(options: ServerOptions) {
  const { settings } = options;
  const context = options.context ?? createContext(settings, options.overrides);
  const { port, host, corsOrigins, production } = settings.server;

  const app = express();

  // Middleware
  app.use(requestId());
  app.use(requestLogger());
  app.use(securityHeaders({ production }));
  app.use(cors({ origin: corsOrigins.includes('*') ? '*' : corsOrigins }));
  app.use(express.json());
  app.use(identify(context.tokens));
  app.use(
    rateLimit(context.limiters.api, {
      subject: userOrIp,
      exempt: (req) => req.path === HEALTH_PATH || req.path.startsWith(`${HEALTH_PATH}/`),
    })
  );

  // API Routes
  app.use(HEALTH_PATH, createHealthRouter(context));
  app.use(`${BASE_PATH}/users`, createUsersRouter(context));
  app.use(`${BASE_PATH}/projects`, createProjectsRouter(context));
  app.use(`${BASE_PATH}/specifications`, createSpecificationsRouter(context));
  app.use(`${BASE_PATH}/items`, createItemsRouter(context));

  app.use(notFoundHandler());
  app.use(errorHandler());

  return { app, context, port, host };
}

export interface RunningServer {
  server: Server;
  close(): Promise<void>;
}

export async function startServer(options: ServerOptions): Promise<RunningServer> {
  const { app, context, port, host } = createServer(options);

  const server = await new Promise<Server>((resolve, reject) => {
    const listening = app.listen(port, host, () => resolve(listening));
    listening.once('error', reject);
  });

  log.info(`Specnest API v${APP_VERSION} listening on http://${host}:${port}${BASE_PATH}`);

  return {
    server,
    async close() {
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      });
      await closeContext(context);
      log.info('server stopped');
    },
  };
}
