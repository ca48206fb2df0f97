/**
 * @fileoverview Service wiring.
 *
 * Builds the registry, provider, handlers, summarizer and dialog manager
 * from config. Any piece can be overridden, which is how tests swap in a
 * scripted provider or an in-memory store.
 */

import type { GenerationProvider } from './provider/types.js';
import type { DialogStore } from './dialog/types.js';
import type { Summarizer } from '../orchestrator/summarizer.js';
import type { OrchestratorDeps } from '../orchestrator/orchestrate.js';
import config from '../config.js';
import { CapabilityRegistry, getCapabilityRegistry } from '../registry/capabilities.js';
import { createHandlers } from '../registry/agents.js';
import { getProvider } from './provider/index.js';
import { getDialogStore } from './dialog/index.js';
import { DialogManager } from './dialog/manager.js';
import { HeuristicSummarizer, ProviderSummarizer } from '../orchestrator/summarizer.js';

export interface Services {
  registry: CapabilityRegistry;
  provider: GenerationProvider;
  store: DialogStore;
  summarizer: Summarizer;
  orchestrator: OrchestratorDeps;
  manager: DialogManager;
}

export interface ServiceOverrides {
  registry?: CapabilityRegistry;
  provider?: GenerationProvider;
  store?: DialogStore;
  summarizer?: Summarizer;
  now?: () => number;
}

export function buildServices(overrides: ServiceOverrides = {}): Services {
  const registry = overrides.registry ?? getCapabilityRegistry();
  const provider = overrides.provider ?? getProvider();
  const store = overrides.store ?? getDialogStore();
  const summarizer = overrides.summarizer
    ?? (config.dialogs.summaryMode === 'llm' ? new ProviderSummarizer(provider) : new HeuristicSummarizer());

  const { defaultHandler, escalationHandler } = config.orchestration;
  const handlers = createHandlers({
    provider,
    registry,
    settings: {
      defaultHandler,
      escalationHandler,
      maxUnresolvedTurns: config.orchestration.maxUnresolvedTurns,
      maxTokens: config.models.maxTokens,
      temperatures: {
        general: config.temperatures.general,
        sales: config.temperatures.sales,
        technical: config.temperatures.technical,
        escalation: config.temperatures.escalation,
      },
    },
  });

  const orchestrator: OrchestratorDeps = {
    registry,
    provider,
    handlers,
    settings: {
      defaultHandler,
      escalationHandler,
      confidenceThreshold: config.orchestration.confidenceThreshold,
      maxReroutes: config.orchestration.maxReroutes,
    },
  };

  const manager = new DialogManager({
    store,
    orchestrator,
    summarizer,
    settings: {
      maxHistoryLength: config.dialogs.maxHistoryLength,
      timeoutMinutes: config.dialogs.timeoutMinutes,
      escalationHandler,
    },
    now: overrides.now,
  });

  return { registry, provider, store, summarizer, orchestrator, manager };
}
