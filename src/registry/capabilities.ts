/**
 * Capability Registry
 *
 * Catalog of handlers with their metadata and availability. The orchestrator
 * and router query it fresh on every turn; availability is the only mutable
 * field and is flipped by health signals or the agents endpoint.
 *
 * Adding a new handler only requires an entry in registry/agents.ts.
 */

import type { Capability } from '../orchestrator/types.js';
import config from '../config.js';
import { NotFoundError } from '../utils/errors.js';
import { createLogger } from '../utils/observability/index.js';
import { AGENTS } from './agents.js';

const logger = createLogger({ domain: 'registry' });

function snapshot(capability: Capability): Capability {
  return { ...capability, skills: [...capability.skills], intents: [...capability.intents] };
}

export class CapabilityRegistry {
  private readonly capabilities = new Map<string, Capability>();

  constructor(capabilities: readonly Capability[], unavailable: readonly string[] = []) {
    for (const capability of capabilities) {
      if (this.capabilities.has(capability.name)) {
        throw new Error(`Duplicate capability name: ${capability.name}`);
      }
      this.capabilities.set(capability.name, snapshot(capability));
    }
    for (const name of unavailable) {
      const capability = this.capabilities.get(name);
      if (capability) capability.available = false;
    }
  }

  /** All registered capabilities, in registration order. */
  list(): Capability[] {
    return [...this.capabilities.values()].map(snapshot);
  }

  listAvailable(): Capability[] {
    return this.list().filter(capability => capability.available);
  }

  has(name: string): boolean {
    return this.capabilities.has(name);
  }

  /**
   * @throws NotFoundError for an unregistered name
   */
  get(name: string): Capability {
    const capability = this.capabilities.get(name);
    if (!capability) {
      throw new NotFoundError(`Handler not found: ${name}`, { handler: name });
    }
    return snapshot(capability);
  }

  /** False for unregistered names. */
  isAvailable(name: string): boolean {
    return this.capabilities.get(name)?.available ?? false;
  }

  /**
   * @throws NotFoundError for an unregistered name
   */
  setAvailability(name: string, available: boolean): Capability {
    const capability = this.capabilities.get(name);
    if (!capability) {
      throw new NotFoundError(`Handler not found: ${name}`, { handler: name });
    }
    if (capability.available !== available) {
      capability.available = available;
      logger.info('availability_changed', { handler: name, available });
    }
    return snapshot(capability);
  }
}

let instance: CapabilityRegistry | null = null;

/**
 * Get the registry singleton, seeded from the agents module.
 */
export function getCapabilityRegistry(): CapabilityRegistry {
  if (!instance) {
    instance = new CapabilityRegistry(
      AGENTS.map(agent => agent.capability),
      config.orchestration.unavailableHandlers
    );
  }
  return instance;
}

/**
 * Reset the registry singleton (for testing).
 */
export function resetCapabilityRegistry(): void {
  instance = null;
}
