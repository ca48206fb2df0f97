// Centralized Agent Registry (canonical source of truth).
//
// Each handler module exports its capability and a handler factory.
// Adding a handler means adding its module and one entry here.

import type { Capability, SpecialistHandler } from '../orchestrator/types.js';
import type { HandlerDeps } from '../agents/types.js';

import { capability as generalCapability, createHandler as createGeneralHandler } from '../agents/general/index.js';
import { capability as salesCapability, createHandler as createSalesHandler } from '../agents/sales/index.js';
import { capability as technicalCapability, createHandler as createTechnicalHandler } from '../agents/technical/index.js';
import { capability as escalationCapability, createHandler as createEscalationHandler } from '../agents/escalation/index.js';

export const AGENTS: Array<{
  capability: Capability;
  createHandler: (deps: HandlerDeps) => SpecialistHandler;
}> = [
  { capability: generalCapability, createHandler: createGeneralHandler },
  { capability: salesCapability, createHandler: createSalesHandler },
  { capability: technicalCapability, createHandler: createTechnicalHandler },
  { capability: escalationCapability, createHandler: createEscalationHandler },
];

/**
 * Instantiate every registered handler, keyed by name.
 */
export function createHandlers(deps: HandlerDeps): Map<string, SpecialistHandler> {
  return new Map(AGENTS.map(agent => [agent.capability.name, agent.createHandler(deps)]));
}
