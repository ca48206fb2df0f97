/**
 * Escalation Agent
 *
 * Supervisor-level handler. It never hands off to itself and is never
 * chosen by the router; when the customer signals that the issue is
 * resolved it hands the conversation back to the default handler.
 */

import type {
  Capability,
  HandlerInput,
  HandlerOutput,
  HandoffDecision,
  SpecialistHandler,
} from '../../orchestrator/types.js';
import type { HandlerDeps } from '../types.js';
import { isResolutionSignal } from '../triggers.js';
import { ESCALATION_AGENT_PROMPT } from './prompt.js';

export const capability: Capability = {
  name: 'escalation',
  specialization: 'escalation',
  skills: ['supervisor', 'manager', 'complaint', 'escalat', 'refund approval'],
  intents: [],
  description: 'Supervisor handling for refunds, complaints, critical incidents and stuck conversations.',
  available: true,
};

function buildPrompt(input: HandlerInput, decision: HandoffDecision): string {
  let prompt = ESCALATION_AGENT_PROMPT;

  if (input.handoff) {
    prompt += `\n\nThe ${input.handoff.from} team escalated this conversation (reason: ${input.handoff.reason}).`;
  }
  if (decision.type === 'handoff') {
    prompt += '\n\nThe customer confirmed the issue is resolved. Thank them and close politely.';
  }

  return prompt;
}

export function createHandler(deps: HandlerDeps): SpecialistHandler {
  const returnTo = deps.settings.defaultHandler;

  return {
    name: capability.name,

    async handle(input: HandlerInput): Promise<HandlerOutput> {
      const resolved = isResolutionSignal(input.userText) && returnTo !== capability.name;
      const decision: HandoffDecision = resolved
        ? { type: 'handoff', target: returnTo, reason: 'issue_resolved' }
        : { type: 'stay' };

      const response = await deps.provider.complete({
        operation: `reply:${capability.name}`,
        system: buildPrompt(input, decision),
        context: input.context,
        userText: input.userText,
        temperature: deps.settings.temperatures.escalation,
        maxTokens: deps.settings.maxTokens,
        signal: input.signal,
      });

      const metadata: Record<string, unknown> = {
        specialization: capability.specialization,
        escalated: true,
      };
      if (resolved) metadata.trigger = 'issue_resolved';

      return { response, decision, metadata };
    },
  };
}
