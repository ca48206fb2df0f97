/**
 * @fileoverview Health and service info routes.
 */

import { Router, Request, Response } from 'express';
import type { CapabilityRegistry } from '../registry/capabilities.js';
import type { DialogStore } from '../services/dialog/types.js';
import { OPEN_STATUSES } from '../services/dialog/types.js';
import config from '../config.js';
import { sendError } from './errors.js';

export type HealthStatus = 'healthy' | 'degraded' | 'unhealthy';

export interface HealthDeps {
  registry: CapabilityRegistry;
  store: DialogStore;
  startedAt: number;
  now?: () => number;
}

/**
 * Storage down → unhealthy; default or escalation handler down → degraded.
 */
export function overallStatus(storageOk: boolean, defaultOk: boolean, escalationOk: boolean): HealthStatus {
  if (!storageOk) return 'unhealthy';
  if (!defaultOk || !escalationOk) return 'degraded';
  return 'healthy';
}

/**
 * Basic liveness check.
 */
export function healthHandler(_req: Request, res: Response): void {
  res.json({
    status: 'ok',
    timestamp: new Date().toISOString(),
  });
}

/**
 * Routes mounted at the application root.
 */
export function createRootRouter(): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    res.json({
      name: config.appName,
      version: config.appVersion,
      apiPrefix: config.apiPrefix,
      docs: `${config.apiPrefix}/health`,
    });
  });
  router.get('/health', healthHandler);

  return router;
}

/**
 * Detailed health, mounted under the API prefix.
 */
export function createHealthRouter(deps: HealthDeps): Router {
  const router = Router();
  const now = deps.now ?? Date.now;

  router.get('/health', async (_req, res) => {
    try {
      const { registry, store } = deps;
      const storageOk = store.isHealthy();
      const defaultOk = registry.isAvailable(config.orchestration.defaultHandler);
      const escalationOk = registry.isAvailable(config.orchestration.escalationHandler);
      const status = overallStatus(storageOk, defaultOk, escalationOk);

      res.status(status === 'unhealthy' ? 503 : 200).json({
        status,
        version: config.appVersion,
        uptimeSeconds: Math.floor((now() - deps.startedAt) / 1000),
        handlers: {
          total: registry.list().length,
          available: registry.listAvailable().map(capability => capability.name),
        },
        storage: {
          provider: config.dialogs.provider,
          available: storageOk,
          openDialogs: storageOk ? await store.countDialogs(OPEN_STATUSES) : null,
        },
        timestamp: new Date(now()).toISOString(),
      });
    } catch (error) {
      sendError(res, error);
    }
  });

  return router;
}
