/**
 * General Agent
 *
 * The default handler. The router falls back to it on low confidence, ties
 * and unavailable targets, and escalation hands resolved issues back to it.
 */

import type { Capability, SpecialistHandler } from '../../orchestrator/types.js';
import type { HandlerDeps } from '../types.js';
import { createSpecialistHandler } from '../specialist.js';
import { GENERAL_AGENT_PROMPT } from './prompt.js';

export const capability: Capability = {
  name: 'general',
  specialization: 'general_support',
  skills: ['hours', 'address', 'location', 'policy', 'policies', 'contact', 'delivery', 'shipping'],
  intents: ['general_question'],
  description: 'General questions, policies, opening hours and anything that does not fit a specialist.',
  available: true,
};

export function createHandler(deps: HandlerDeps): SpecialistHandler {
  return createSpecialistHandler(
    {
      capability,
      systemPrompt: GENERAL_AGENT_PROMPT,
      temperature: deps.settings.temperatures.general,
      triggers: [],
    },
    deps
  );
}
