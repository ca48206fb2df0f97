/**
 * Technical Agent
 *
 * Troubleshooting and account access. Outages, data loss and security
 * incidents are escalated immediately.
 */

import type { Capability, SpecialistHandler } from '../../orchestrator/types.js';
import type { HandlerDeps } from '../types.js';
import { createSpecialistHandler } from '../specialist.js';
import { CRITICAL_INCIDENT_PATTERNS } from '../triggers.js';
import { TECHNICAL_AGENT_PROMPT } from './prompt.js';

export const capability: Capability = {
  name: 'technical',
  specialization: 'technical_support',
  skills: [
    'error', 'crash', 'broken', 'not working', 'install', 'setup', 'set up', 'internet',
    'wifi', 'router', 'device', 'outage', 'bug', 'password', 'login', 'log in', 'sign in',
  ],
  intents: ['technical_issue', 'account_access'],
  description: 'Troubleshooting errors, connectivity, devices, installation and login problems.',
  available: true,
};

export function createHandler(deps: HandlerDeps): SpecialistHandler {
  return createSpecialistHandler(
    {
      capability,
      systemPrompt: TECHNICAL_AGENT_PROMPT,
      temperature: deps.settings.temperatures.technical,
      triggers: [{ trigger: 'critical_incident', patterns: CRITICAL_INCIDENT_PATTERNS, reason: 'critical_incident' }],
    },
    deps
  );
}
