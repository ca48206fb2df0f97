/**
 * Offline provider for development and demos (USE_MOCK_LLM=true).
 *
 * Classification scores each intent by keyword hits; confidence is the
 * intent's share of all hits. Completions are fixed acknowledgements.
 */

import type {
  Classification,
  ClassificationRequest,
  CompletionRequest,
  GenerationProvider,
  IntentCandidate,
} from './types.js';
import { findKeywords, normalizeText } from '../../utils/keywords.js';
import { safeSnippet } from '../../utils/observability/index.js';

export const UNKNOWN_INTENT = 'unknown';

const SUMMARY_MAX_LENGTH = 600;

export class KeywordProvider implements GenerationProvider {
  readonly name = 'keyword';

  async complete(request: CompletionRequest): Promise<string> {
    if (request.operation === 'summary') {
      return safeSnippet(request.userText.replace(/\s+/g, ' ').trim(), SUMMARY_MAX_LENGTH);
    }

    const desk = request.operation.startsWith('reply:') ? request.operation.slice('reply:'.length) : 'support';
    return `Thanks for your message. The ${desk} desk has noted your request and will follow up.`;
  }

  async classify(request: ClassificationRequest): Promise<Classification> {
    const text = normalizeText(request.text);

    const scored = request.intents
      .map(intent => ({ label: intent.label, hits: findKeywords(text, intent.keywords).length }))
      .filter(entry => entry.hits > 0);

    const total = scored.reduce((sum, entry) => sum + entry.hits, 0);
    if (total === 0) {
      return { label: UNKNOWN_INTENT, confidence: 0, candidates: [{ label: UNKNOWN_INTENT, confidence: 0 }] };
    }

    const candidates: IntentCandidate[] = scored
      .map(entry => ({ label: entry.label, confidence: entry.hits / total }))
      .sort((a, b) => b.confidence - a.confidence);

    return { label: candidates[0].label, confidence: candidates[0].confidence, candidates };
  }
}
