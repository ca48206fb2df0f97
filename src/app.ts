/**
 * @fileoverview Express application factory.
 *
 * Kept apart from the entry point so tests can mount the full HTTP surface
 * on in-memory services without opening a port.
 */

import express, { Express, NextFunction, Request, Response } from 'express';
import type { DialogManager } from './services/dialog/manager.js';
import type { CapabilityRegistry } from './registry/capabilities.js';
import type { DialogStore } from './services/dialog/types.js';
import config from './config.js';
import { createDialogueRouter } from './routes/dialogue.js';
import { createAgentsRouter } from './routes/agents.js';
import { createHealthRouter, createRootRouter } from './routes/health.js';
import { errorHandler, sendError } from './routes/errors.js';
import { NotFoundError } from './utils/errors.js';
import { createLogger, resolveRequestId, withLogContext } from './utils/observability/index.js';

const logger = createLogger({ domain: 'http' });

export interface AppServices {
  manager: DialogManager;
  registry: CapabilityRegistry;
  store: DialogStore;
  startedAt?: number;
}

/**
 * Attach a request id and log each request once it completes.
 */
function requestContext(req: Request, res: Response, next: NextFunction): void {
  const requestId = resolveRequestId(req.headers['x-request-id']);
  const startTime = Date.now();
  res.setHeader('x-request-id', requestId);

  withLogContext({ requestId }, () => {
    res.on('finish', () => {
      logger.info('request_completed', {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        durationMs: Date.now() - startTime,
      });
    });
    next();
  });
}

export function createApp(services: AppServices): Express {
  const app = express();

  app.use(requestContext);
  app.use(express.json({ limit: '100kb' }));

  app.use(createRootRouter());
  app.use(config.apiPrefix, createDialogueRouter(services.manager));
  app.use(config.apiPrefix, createAgentsRouter(services.registry));
  app.use(config.apiPrefix, createHealthRouter({
    registry: services.registry,
    store: services.store,
    startedAt: services.startedAt ?? Date.now(),
  }));

  app.use((req, res) => {
    sendError(res, new NotFoundError(`Route not found: ${req.method} ${req.path}`));
  });
  app.use(errorHandler);

  return app;
}
