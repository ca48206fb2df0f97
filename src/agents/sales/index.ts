/**
 * Sales Agent
 *
 * Billing, plans and purchases. Refund requests go straight to escalation
 * because only supervisors can approve them.
 */

import type { Capability, SpecialistHandler } from '../../orchestrator/types.js';
import type { HandlerDeps } from '../types.js';
import { createSpecialistHandler } from '../specialist.js';
import { REFUND_PATTERNS } from '../triggers.js';
import { SALES_AGENT_PROMPT } from './prompt.js';

export const capability: Capability = {
  name: 'sales',
  specialization: 'billing_and_sales',
  skills: [
    'refund', 'charge', 'invoice', 'bill', 'payment', 'price', 'pricing', 'cost',
    'purchase', 'buy', 'discount', 'subscription', 'upgrade', 'plan', 'quote',
  ],
  intents: ['billing_issue', 'purchase_inquiry'],
  description: 'Billing questions, invoices, payments, plans, upgrades and purchases.',
  available: true,
};

export function createHandler(deps: HandlerDeps): SpecialistHandler {
  return createSpecialistHandler(
    {
      capability,
      systemPrompt: SALES_AGENT_PROMPT,
      temperature: deps.settings.temperatures.sales,
      triggers: [{ trigger: 'refund_request', patterns: REFUND_PATTERNS, reason: 'refund_escalation' }],
    },
    deps
  );
}
