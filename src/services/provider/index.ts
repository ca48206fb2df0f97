/**
 * Generation provider factory.
 */

import type { GenerationProvider } from './types.js';
import config from '../../config.js';
import { AnthropicProvider } from '../anthropic/provider.js';
import { KeywordProvider } from './keyword.js';

export type {
  GenerationProvider,
  CompletionRequest,
  ClassificationRequest,
  Classification,
  IntentCandidate,
  IntentOption,
} from './types.js';
export { KeywordProvider, UNKNOWN_INTENT } from './keyword.js';
export { withRetry, isRetryableError, isRetryableStatus, backoffDelayMs } from './retry.js';
export type { RetryOptions } from './retry.js';

let instance: GenerationProvider | null = null;

/**
 * Get the provider singleton.
 */
export function getProvider(): GenerationProvider {
  if (instance) return instance;
  instance = config.useMockLlm ? new KeywordProvider() : new AnthropicProvider();
  return instance;
}

/**
 * Reset the provider singleton (for testing).
 */
export function resetProvider(): void {
  instance = null;
}
