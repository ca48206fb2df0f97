/**
 * Intent Router
 *
 * Classifies a customer message against the intents of the routable
 * handlers and picks the target. Falls back to the default handler on low
 * confidence, ties between handlers, unknown labels and unavailable targets.
 * Never returns the escalation handler.
 *
 * Provider failures propagate as ProviderError; only weak classifications
 * fall back.
 */

import type { ConversationContext, RoutingDecision, RoutingFallback } from './types.js';
import type { CapabilityRegistry } from '../registry/capabilities.js';
import type { GenerationProvider } from '../services/provider/types.js';
import { intentOptionsFor } from '../agents/intents.js';
import { RoutingError } from '../utils/errors.js';
import { createLogger } from '../utils/observability/index.js';

const logger = createLogger({ domain: 'router' });

/** Confidence scores closer than this are a tie. */
const TIE_EPSILON = 1e-6;

export interface RouterSettings {
  defaultHandler: string;
  escalationHandler: string;
  confidenceThreshold: number;
}

export interface RouterDeps {
  registry: CapabilityRegistry;
  provider: GenerationProvider;
  settings: RouterSettings;
}

/**
 * Map each intent label to the first routable handler that serves it.
 */
export function buildIntentMap(registry: CapabilityRegistry, escalationHandler: string): Map<string, string> {
  const intentToHandler = new Map<string, string>();
  for (const capability of registry.list()) {
    if (capability.name === escalationHandler) continue;
    for (const intent of capability.intents) {
      if (!intentToHandler.has(intent)) {
        intentToHandler.set(intent, capability.name);
      }
    }
  }
  return intentToHandler;
}

/**
 * Route a customer message to a handler.
 *
 * @throws RoutingError when a fallback is needed and the default handler is unavailable
 * @throws ProviderError when classification fails
 */
export async function routeIntent(
  text: string,
  context: ConversationContext,
  deps: RouterDeps,
  signal?: AbortSignal
): Promise<RoutingDecision> {
  const { registry, provider, settings } = deps;

  const intentToHandler = buildIntentMap(registry, settings.escalationHandler);
  const classification = await provider.classify({
    text,
    context,
    intents: intentOptionsFor([...intentToHandler.keys()]),
    signal,
  });

  const fallback = (reason: RoutingFallback): RoutingDecision => {
    if (!registry.isAvailable(settings.defaultHandler)) {
      throw new RoutingError(`No available handler: default handler "${settings.defaultHandler}" is unavailable`, {
        intent: classification.label,
        fallback: reason,
      });
    }
    const decision: RoutingDecision = {
      target: settings.defaultHandler,
      intent: classification.label,
      confidence: classification.confidence,
      fallback: reason,
    };
    logger.info('routing_fallback', {
      handler: decision.target,
      intent: decision.intent,
      confidence: decision.confidence,
      fallback: reason,
    });
    return decision;
  };

  const target = intentToHandler.get(classification.label);
  if (!target) {
    return fallback('unknown_intent');
  }
  if (classification.confidence < settings.confidenceThreshold) {
    return fallback('low_confidence');
  }

  const topHandlers = new Set<string>([target]);
  for (const candidate of classification.candidates) {
    const handler = intentToHandler.get(candidate.label);
    if (handler && candidate.confidence >= classification.confidence - TIE_EPSILON) {
      topHandlers.add(handler);
    }
  }
  if (topHandlers.size > 1) {
    return fallback('tie');
  }

  if (!registry.isAvailable(target)) {
    return fallback('target_unavailable');
  }

  logger.info('routed', {
    handler: target,
    intent: classification.label,
    confidence: classification.confidence,
  });
  return { target, intent: classification.label, confidence: classification.confidence };
}
