/**
 * Generation provider contract.
 *
 * Both operations may suspend; implementations apply their own timeout and
 * retry policy and surface failures as ProviderError.
 */

import type { ConversationContext } from '../../orchestrator/types.js';

export interface CompletionRequest {
  /** Label for logs and offline replies (e.g. "reply:sales", "summary") */
  operation: string;
  system: string;
  context: ConversationContext;
  userText: string;
  temperature?: number;
  maxTokens?: number;
  signal?: AbortSignal;
}

/**
 * One intent the classifier may choose.
 */
export interface IntentOption {
  label: string;
  description: string;
  keywords: readonly string[];
}

export interface ClassificationRequest {
  text: string;
  context: ConversationContext;
  intents: readonly IntentOption[];
  signal?: AbortSignal;
}

export interface IntentCandidate {
  label: string;
  confidence: number;
}

export interface Classification {
  label: string;
  confidence: number;

  /** Scored alternatives, best first; includes the top label */
  candidates: IntentCandidate[];
}

export interface GenerationProvider {
  readonly name: string;
  complete(request: CompletionRequest): Promise<string>;
  classify(request: ClassificationRequest): Promise<Classification>;
}
