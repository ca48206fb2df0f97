/**
 * Anthropic-backed generation provider.
 *
 * Completions and intent classification both go through the Messages API
 * under the shared timeout/retry policy.
 */

import type { TextBlock } from '@anthropic-ai/sdk/resources/messages';
import type {
  Classification,
  ClassificationRequest,
  CompletionRequest,
  GenerationProvider,
  IntentCandidate,
} from '../provider/types.js';
import type { RetryOptions } from '../provider/retry.js';

import config from '../../config.js';
import { ProviderError } from '../../utils/errors.js';
import { withRetry } from '../provider/retry.js';
import { getClient } from './client.js';
import { toMessageParams, summaryBlock } from './messages.js';
import { buildClassificationPrompt } from './prompts/index.js';

const CLASSIFICATION_MAX_TOKENS = 256;

export interface AnthropicProviderOptions {
  completionModel: string;
  classifierModel: string;
  summaryModel: string;
  maxTokens: number;
  classifierTemperature: number;
  retry: Omit<RetryOptions, 'signal'>;
}

function defaultOptions(): AnthropicProviderOptions {
  return {
    completionModel: config.models.agent,
    classifierModel: config.models.classifier,
    summaryModel: config.models.summary,
    maxTokens: config.models.maxTokens,
    classifierTemperature: config.temperatures.router,
    retry: {
      timeoutMs: config.provider.timeoutMs,
      maxRetries: config.provider.maxRetries,
      baseDelayMs: config.provider.retryBaseMs,
    },
  };
}

function extractText(content: Array<{ type: string }>): string {
  const textBlock = content.find(
    (block): block is TextBlock => block.type === 'text'
  );
  return textBlock?.text.trim() ?? '';
}

function clampConfidence(value: number): number {
  return Math.min(1, Math.max(0, value));
}

function isCandidate(value: unknown): value is IntentCandidate {
  return (
    typeof value === 'object' && value !== null &&
    'label' in value && typeof value.label === 'string' &&
    'confidence' in value && typeof value.confidence === 'number' &&
    Number.isFinite(value.confidence)
  );
}

/**
 * Parse the classifier's JSON reply.
 * Tolerates a markdown code fence around the object.
 *
 * @throws ProviderError when the reply is not a usable classification
 */
export function parseClassification(responseText: string): Classification {
  const fenced = responseText.match(/```(?:json)?\s*([\s\S]*?)```/);
  const jsonText = (fenced ? fenced[1] : responseText).trim();

  let parsed: unknown;
  try {
    parsed = JSON.parse(jsonText);
  } catch {
    throw new ProviderError('Classifier returned invalid JSON', { responseLength: responseText.length });
  }

  // Boundary: validate shape before use
  if (!isCandidate(parsed)) {
    throw new ProviderError('Classifier response is missing label or confidence');
  }

  const top: IntentCandidate = { label: parsed.label, confidence: clampConfidence(parsed.confidence) };
  const rawCandidates = 'candidates' in parsed && Array.isArray(parsed.candidates) ? parsed.candidates : [];

  const candidates = rawCandidates
    .filter(isCandidate)
    .map(candidate => ({ label: candidate.label, confidence: clampConfidence(candidate.confidence) }))
    .filter(candidate => candidate.label !== top.label);

  candidates.push(top);
  candidates.sort((a, b) => b.confidence - a.confidence);

  return { label: top.label, confidence: top.confidence, candidates };
}

export class AnthropicProvider implements GenerationProvider {
  readonly name = 'anthropic';
  private readonly options: AnthropicProviderOptions;

  constructor(options: Partial<AnthropicProviderOptions> = {}) {
    this.options = { ...defaultOptions(), ...options };
  }

  async complete(request: CompletionRequest): Promise<string> {
    const anthropic = getClient();
    const model = request.operation === 'summary' ? this.options.summaryModel : this.options.completionModel;

    return withRetry(request.operation, async (signal) => {
      const response = await anthropic.messages.create(
        {
          model,
          max_tokens: request.maxTokens ?? this.options.maxTokens,
          temperature: request.temperature,
          system: `${request.system}${summaryBlock(request.context)}`,
          messages: toMessageParams(request.context, request.userText),
        },
        { signal }
      );

      const text = extractText(response.content);
      if (!text) {
        throw new ProviderError(`${request.operation} returned no text`);
      }
      return text;
    }, { ...this.options.retry, signal: request.signal });
  }

  async classify(request: ClassificationRequest): Promise<Classification> {
    const anthropic = getClient();

    return withRetry('classify', async (signal) => {
      const response = await anthropic.messages.create(
        {
          model: this.options.classifierModel,
          max_tokens: CLASSIFICATION_MAX_TOKENS,
          temperature: this.options.classifierTemperature,
          system: buildClassificationPrompt(request.intents, request.context),
          messages: [{ role: 'user', content: request.text }],
        },
        { signal }
      );

      return parseClassification(extractText(response.content));
    }, { ...this.options.retry, signal: request.signal });
  }
}
