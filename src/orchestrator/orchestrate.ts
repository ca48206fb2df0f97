/**
 * Main Orchestrator
 *
 * Drives one turn of a dialog:
 * 1. Resolves the current handler from the newest agent-attributed record
 * 2. Routes only when no available owner exists
 * 3. Dispatches the customer's text to the handler
 * 4. Follows handoff decisions, re-dispatching the same text, under a
 *    reroute bound that forces escalation when exceeded
 * 5. Returns a frozen TurnResult
 *
 * The orchestrator holds no state between turns and persists nothing.
 */

import type {
  ConversationContext,
  HandlerOutput,
  RoutingDecision,
  SpecialistHandler,
  TurnResult,
  TurnState,
} from './types.js';
import { ORCHESTRATION_REASONS } from './types.js';
import type { CapabilityRegistry } from '../registry/capabilities.js';
import type { GenerationProvider } from '../services/provider/types.js';
import type { RouterSettings } from './router.js';
import { routeIntent } from './router.js';
import { findLastAgentHandler } from './conversation-window.js';
import {
  AppError,
  HandoffLoopError,
  InvalidTransitionError,
  RoutingError,
  TurnCancelledError,
  errorMessage,
} from '../utils/errors.js';
import { createLogger } from '../utils/observability/index.js';

const baseLogger = createLogger({ domain: 'orchestrator' });

export interface OrchestratorSettings extends RouterSettings {
  /** Handoffs allowed per turn before escalation is forced */
  maxReroutes: number;
}

export interface OrchestratorDeps {
  registry: CapabilityRegistry;
  provider: GenerationProvider;
  handlers: ReadonlyMap<string, SpecialistHandler>;
  settings: OrchestratorSettings;
}

export interface TurnOptions {
  signal?: AbortSignal;
}

interface Transition {
  from: string;
  to: string;
  reason: string;
}

const ALLOWED_STATES: Record<TurnState, readonly TurnState[]> = {
  unresolved: ['routed', 'failed'],
  routed: ['dispatched', 'failed'],
  dispatched: ['handoff_pending', 'resolved', 'failed'],
  handoff_pending: ['dispatched', 'resolved', 'failed'],
  resolved: [],
  failed: [],
};

/**
 * Ordered record of the states one turn passes through.
 */
class TurnStateTrace {
  readonly states: TurnState[];

  constructor(initial: TurnState) {
    this.states = [initial];
  }

  get current(): TurnState {
    return this.states[this.states.length - 1];
  }

  enter(next: TurnState): void {
    if (!ALLOWED_STATES[this.current].includes(next)) {
      throw new InvalidTransitionError(`Illegal turn state change ${this.current} -> ${next}`);
    }
    this.states.push(next);
  }
}

function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new TurnCancelledError();
  }
}

/**
 * Run one turn.
 *
 * @param dialogId Dialog the turn belongs to (for logging and handlers)
 * @param userText The customer's message
 * @param context Retained window plus summary, before this turn's records
 * @throws ProviderError when generation or classification fails
 * @throws RoutingError when routing finds no available handler
 * @throws TurnCancelledError when the signal aborts
 */
export async function processTurn(
  dialogId: string,
  userText: string,
  context: ConversationContext,
  deps: OrchestratorDeps,
  options: TurnOptions = {}
): Promise<TurnResult> {
  const { registry, handlers, settings } = deps;
  const { signal } = options;
  const logger = baseLogger.child({ dialogId });
  const startTime = Date.now();

  const isDispatchable = (name: string): boolean => handlers.has(name) && registry.isAvailable(name);

  const priorOwner = findLastAgentHandler(context.messages);
  const ownerAvailable = priorOwner !== null && isDispatchable(priorOwner);
  const trace = new TurnStateTrace(ownerAvailable ? 'dispatched' : 'unresolved');

  const transitions: Transition[] = [];
  const handoffChain: string[] = [];
  const anomalies: string[] = [];
  let rerouteCount = 0;
  let intent: string | null = null;
  let routingConfidence: number | undefined;
  let routingFallback: string | undefined;
  let routed = false;
  let loopGuardTriggered = false;

  logger.info('turn_started', {
    handler: priorOwner ?? undefined,
    hasOwner: ownerAvailable,
    messageLength: userText.length,
    windowSize: context.messages.length,
  });

  const dispatch = async (name: string, handoff?: { from: string; reason: string }): Promise<HandlerOutput> => {
    throwIfCancelled(signal);
    const handler = handlers.get(name);
    if (!handler) {
      throw new InvalidTransitionError(`No handler instance for ${name}`, { handler: name });
    }

    handoffChain.push(name);
    logger.debug('handler_dispatched', { handler: name, rerouteCount });
    const output = await handler.handle({ dialogId, userText, context, handoff, signal });
    throwIfCancelled(signal);
    return output;
  };

  try {
    let current: string;

    if (priorOwner !== null && ownerAvailable) {
      current = priorOwner;
    } else {
      const route = await routeIntent(
        userText,
        context,
        { registry, provider: deps.provider, settings },
        signal
      );
      current = route.target;
      routed = true;
      intent = route.intent;
      routingConfidence = route.confidence;
      routingFallback = route.fallback;
      trace.enter('routed');
      trace.enter('dispatched');
    }

    let output = await dispatch(current);

    while (output.decision.type === 'handoff') {
      const { target, reason } = output.decision;
      trace.enter('handoff_pending');

      if (target === current) {
        const anomaly = new InvalidTransitionError(`Handler ${current} requested a handoff to itself`, {
          handler: current,
          reason,
        });
        logger.warn('invalid_transition', { handler: current, errorCode: anomaly.code, error: anomaly.message });
        anomalies.push(`self_handoff:${current}`);
        break;
      }

      let next = target;
      let nextReason = reason;

      if (!isDispatchable(target)) {
        const anomaly = new InvalidTransitionError(
          `Handoff target ${target} is ${registry.has(target) ? 'unavailable' : 'unknown'}`,
          { handler: current, target, reason }
        );
        logger.warn('invalid_transition', {
          handler: current,
          targetHandler: target,
          errorCode: anomaly.code,
          error: anomaly.message,
        });
        anomalies.push(`${registry.has(target) ? 'unavailable' : 'unknown'}_target:${target}`);

        let route: RoutingDecision;
        try {
          route = await routeIntent(
            userText,
            context,
            { registry, provider: deps.provider, settings },
            signal
          );
        } catch (error) {
          if (!(error instanceof RoutingError)) throw error;
          // No replacement handler: the current one keeps the turn.
          logger.warn('handoff_reroute_failed', {
            handler: current,
            targetHandler: target,
            errorCode: error.code,
            error: error.message,
          });
          anomalies.push(`no_reroute_target:${target}`);
          break;
        }
        intent = intent ?? route.intent;
        if (route.target === current) {
          break;
        }
        next = route.target;
        nextReason = ORCHESTRATION_REASONS.targetUnavailable;
      }

      if (rerouteCount + 1 > settings.maxReroutes) {
        const loopError = new HandoffLoopError(`Reroute bound of ${settings.maxReroutes} exceeded`, {
          chain: [...handoffChain],
          requestedTarget: next,
        });
        logger.warn('handoff_loop', {
          handler: current,
          count: rerouteCount,
          errorCode: loopError.code,
          error: loopError.message,
        });
        loopGuardTriggered = true;

        const escalation = settings.escalationHandler;
        if (!isDispatchable(escalation)) {
          anomalies.push(`escalation_unavailable:${escalation}`);
          break;
        }

        if (current !== escalation) {
          rerouteCount++;
          transitions.push({ from: current, to: escalation, reason: ORCHESTRATION_REASONS.routingLoop });
          trace.enter('dispatched');
          output = await dispatch(escalation, { from: current, reason: ORCHESTRATION_REASONS.routingLoop });
          current = escalation;
        }
        break;
      }

      rerouteCount++;
      transitions.push({ from: current, to: next, reason: nextReason });
      logger.info('handoff', { handler: current, targetHandler: next, reason: nextReason, count: rerouteCount });

      trace.enter('dispatched');
      output = await dispatch(next, { from: current, reason: nextReason });
      current = next;
    }

    trace.enter('resolved');

    let previousHandler: string | null = null;
    let handoffReason: string | null = null;

    if (current !== priorOwner) {
      const last = transitions[transitions.length - 1];
      if (last) {
        previousHandler = last.from;
        handoffReason = loopGuardTriggered ? ORCHESTRATION_REASONS.routingLoop : last.reason;
      } else {
        previousHandler = priorOwner;
        handoffReason = priorOwner === null
          ? ORCHESTRATION_REASONS.initialRouting
          : ORCHESTRATION_REASONS.handlerUnavailable;
      }
    }

    const metadata: Record<string, unknown> = {
      ...output.metadata,
      rerouteCount,
      handoffChain,
      routed,
      transitions: trace.states,
    };
    if (routingConfidence !== undefined) metadata.routingConfidence = routingConfidence;
    if (routingFallback !== undefined) metadata.routingFallback = routingFallback;
    if (anomalies.length > 0) metadata.anomalies = anomalies;
    if (loopGuardTriggered) metadata.loopGuardTriggered = true;

    logger.info('turn_resolved', {
      handler: current,
      previousHandler: previousHandler ?? undefined,
      reason: handoffReason ?? undefined,
      count: rerouteCount,
      durationMs: Date.now() - startTime,
    });

    return Object.freeze({
      response: output.response,
      currentHandler: current,
      previousHandler,
      handoffReason,
      intent,
      metadata: Object.freeze(metadata),
    });
  } catch (error) {
    if (trace.current !== 'resolved' && trace.current !== 'failed') {
      trace.states.push('failed');
    }
    logger.warn('turn_failed', {
      errorCode: error instanceof AppError ? error.code : undefined,
      error: errorMessage(error),
      durationMs: Date.now() - startTime,
    });
    throw error;
  }
}
