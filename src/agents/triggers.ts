/**
 * Handoff triggers shared by the specialist handlers.
 *
 * Patterns follow the transfer phrases customers actually use; they are
 * deliberately coarse and only decide *whether* to hand off, never what
 * to say.
 */

import type { Capability, ConversationContext } from '../orchestrator/types.js';
import { findKeywords } from '../utils/keywords.js';

export const SUPERVISOR_PATTERNS: readonly RegExp[] = [
  /\b(supervisor|manager)\b/i,
  /\b(human|real person|live agent|representative)\b/i,
  /\bescalat/i,
  /\b(speak|talk) (to|with) (someone|somebody|a person)\b/i,
];

export const REFUND_PATTERNS: readonly RegExp[] = [
  /\brefund/i,
  /\bmoney back\b/i,
  /\bchargeback/i,
];

export const CRITICAL_INCIDENT_PATTERNS: readonly RegExp[] = [
  /\boutage\b/i,
  /\bdata loss\b/i,
  /\blost (all )?(of )?(my |our )?(data|files)\b/i,
  /\b(hacked|security breach)\b/i,
  /\b(everything|service|system) (is )?down\b/i,
];

const RESOLUTION_PATTERNS: readonly RegExp[] = [
  /\b(thanks|thank you)\b/i,
  /\b(that|it) (worked|works|helped)\b/i,
  /\b(resolved|solved|sorted|fixed)\b/i,
  /\ball (good|set)\b/i,
];

const STILL_BROKEN_PATTERN = /\b(still|not|again)\b|n't\b/i;

export function matchesAny(text: string, patterns: readonly RegExp[]): boolean {
  return patterns.some(pattern => pattern.test(text));
}

export function isSupervisorRequest(text: string): boolean {
  return matchesAny(text, SUPERVISOR_PATTERNS);
}

/**
 * Customer says the problem is solved ("thanks, that worked"), without a
 * negation that would flip it ("thanks, but it still fails").
 */
export function isResolutionSignal(text: string): boolean {
  return matchesAny(text, RESOLUTION_PATTERNS) && !STILL_BROKEN_PATTERN.test(text);
}

/**
 * Unresolved-turn counter from this handler's previous reply.
 * Zero when the most recent agent reply came from another handler.
 */
export function previousUnresolvedTurns(context: ConversationContext, handler: string): number {
  for (let i = context.messages.length - 1; i >= 0; i--) {
    const record = context.messages[i];
    if (record.sender !== 'agent' || !record.handler) continue;
    if (record.handler !== handler) return 0;

    const value = record.metadata.unresolvedTurns;
    return typeof value === 'number' && Number.isInteger(value) && value > 0 ? value : 0;
  }
  return 0;
}

/**
 * Counter after this turn: reset by a resolution signal, else incremented.
 */
export function nextUnresolvedTurns(context: ConversationContext, handler: string, userText: string): number {
  if (isResolutionSignal(userText)) return 0;
  return previousUnresolvedTurns(context, handler) + 1;
}

/**
 * The specialist whose skills the request matches when it does not match
 * `self` at all. Null when the request is in scope, matches nothing, or is
 * ambiguous between several specialists.
 */
export function findOutOfScopeTarget(
  text: string,
  self: Capability,
  candidates: readonly Capability[]
): Capability | null {
  if (findKeywords(text, self.skills).length > 0) {
    return null;
  }

  let best: Capability | null = null;
  let bestScore = 0;
  let tied = false;

  for (const candidate of candidates) {
    if (candidate.name === self.name) continue;

    const score = findKeywords(text, candidate.skills).length;
    if (score > bestScore) {
      best = candidate;
      bestScore = score;
      tied = false;
    } else if (score > 0 && score === bestScore) {
      tied = true;
    }
  }

  return tied ? null : best;
}
