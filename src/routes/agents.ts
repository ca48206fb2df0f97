/**
 * @fileoverview Handler catalog routes.
 */

import { Router } from 'express';
import type { CapabilityRegistry } from '../registry/capabilities.js';
import { parseAvailability } from './validation.js';
import { sendError } from './errors.js';

export function createAgentsRouter(registry: CapabilityRegistry): Router {
  const router = Router();

  router.get('/agents', (_req, res) => {
    const agents = registry.list();
    res.json({
      agents,
      total: agents.length,
      available: agents.filter(agent => agent.available).length,
    });
  });

  router.patch('/agents/:name/availability', (req, res) => {
    try {
      const available = parseAvailability(req.body);
      res.json(registry.setAvailability(req.params.name ?? '', available));
    } catch (error) {
      sendError(res, error);
    }
  });

  return router;
}
