/**
 * Dependencies shared by all specialist handlers.
 */

import type { CapabilityRegistry } from '../registry/capabilities.js';
import type { GenerationProvider } from '../services/provider/types.js';

/** Sampling temperature per handler */
export interface HandlerTemperatures {
  general: number;
  sales: number;
  technical: number;
  escalation: number;
}

export interface HandlerSettings {
  defaultHandler: string;
  escalationHandler: string;
  maxUnresolvedTurns: number;
  maxTokens: number;
  temperatures: HandlerTemperatures;
}

export interface HandlerDeps {
  provider: GenerationProvider;
  registry: CapabilityRegistry;
  settings: HandlerSettings;
}
