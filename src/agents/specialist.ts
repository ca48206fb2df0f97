/**
 * Shared implementation of the non-escalation specialist handlers.
 *
 * Triggers are evaluated in a fixed order and the first match wins:
 * supervisor request, variant-specific triggers, out-of-scope request,
 * repeated failure. The reply is always generated, also when handing off,
 * so the handler that ends up owning the turn has text to return.
 */

import type {
  Capability,
  HandlerInput,
  HandlerOutput,
  HandoffDecision,
  SpecialistHandler,
} from '../orchestrator/types.js';
import type { HandlerDeps } from './types.js';
import {
  findOutOfScopeTarget,
  isSupervisorRequest,
  matchesAny,
  nextUnresolvedTurns,
} from './triggers.js';

/**
 * A variant-specific trigger, e.g. refund requests in sales.
 */
export interface VariantTrigger {
  /** Name recorded in metadata when it fires */
  trigger: string;
  patterns: readonly RegExp[];
  reason: string;
}

export interface SpecialistDefinition {
  capability: Capability;
  systemPrompt: string;
  temperature: number;
  triggers: readonly VariantTrigger[];
}

interface TriggerOutcome {
  decision: HandoffDecision;
  trigger?: string;
}

const STAY: HandoffDecision = { type: 'stay' };

/**
 * Format capabilities for inclusion in prompts.
 */
export function formatCapabilitiesForPrompt(capabilities: readonly Capability[]): string {
  return capabilities
    .map(capability => `  - ${capability.name} (${capability.specialization}): ${capability.description}`)
    .join('\n');
}

export function buildSpecialistPrompt(
  definition: SpecialistDefinition,
  input: HandlerInput,
  decision: HandoffDecision,
  otherTeams: readonly Capability[]
): string {
  let prompt = definition.systemPrompt;

  if (otherTeams.length > 0) {
    prompt += `\n\nOther teams in this call center:\n${formatCapabilitiesForPrompt(otherTeams)}`;
  }

  if (input.handoff) {
    prompt += `\n\nYou are taking over this conversation from the ${input.handoff.from} team (reason: ${input.handoff.reason}). Introduce yourself as the ${definition.capability.name} team and continue.`;
  }

  if (decision.type === 'handoff') {
    prompt += `\n\nThe customer is being transferred to the ${decision.target} team (reason: ${decision.reason}). Tell them briefly that you are connecting them. Do not try to solve the request yourself.`;
  }

  return prompt;
}

export function createSpecialistHandler(
  definition: SpecialistDefinition,
  deps: HandlerDeps
): SpecialistHandler {
  const { capability } = definition;
  const { escalationHandler, maxUnresolvedTurns } = deps.settings;

  const evaluateTriggers = (input: HandlerInput, unresolvedTurns: number): TriggerOutcome => {
    if (isSupervisorRequest(input.userText)) {
      return {
        decision: { type: 'handoff', target: escalationHandler, reason: 'supervisor_requested' },
        trigger: 'supervisor_request',
      };
    }

    for (const variant of definition.triggers) {
      if (matchesAny(input.userText, variant.patterns)) {
        return {
          decision: { type: 'handoff', target: escalationHandler, reason: variant.reason },
          trigger: variant.trigger,
        };
      }
    }

    const specialists = deps.registry.list().filter(c => c.name !== escalationHandler);
    const target = findOutOfScopeTarget(input.userText, capability, specialists);
    if (target) {
      return {
        decision: { type: 'handoff', target: target.name, reason: `out_of_scope:${target.specialization}` },
        trigger: 'out_of_scope',
      };
    }

    if (unresolvedTurns >= maxUnresolvedTurns) {
      return {
        decision: { type: 'handoff', target: escalationHandler, reason: `unresolved_after_${unresolvedTurns}_turns` },
        trigger: 'repeated_failure',
      };
    }

    return { decision: STAY };
  };

  return {
    name: capability.name,

    async handle(input: HandlerInput): Promise<HandlerOutput> {
      const unresolvedTurns = nextUnresolvedTurns(input.context, capability.name, input.userText);
      const { decision, trigger } = evaluateTriggers(input, unresolvedTurns);

      const otherTeams = deps.registry.listAvailable().filter(c => c.name !== capability.name);
      const response = await deps.provider.complete({
        operation: `reply:${capability.name}`,
        system: buildSpecialistPrompt(definition, input, decision, otherTeams),
        context: input.context,
        userText: input.userText,
        temperature: definition.temperature,
        maxTokens: deps.settings.maxTokens,
        signal: input.signal,
      });

      const metadata: Record<string, unknown> = {
        specialization: capability.specialization,
        unresolvedTurns,
      };
      if (trigger) metadata.trigger = trigger;

      return { response, decision, metadata };
    },
  };
}
