/**
 * Unit tests for the Anthropic provider, against the mocked SDK.
 */

import { describe, it, expect } from 'vitest';
import { AnthropicProvider, parseClassification } from '../../../../src/services/anthropic/provider.js';
import { ProviderError } from '../../../../src/utils/errors.js';
import type { ConversationContext } from '../../../../src/orchestrator/types.js';
import { intentOptionsFor } from '../../../../src/agents/intents.js';
import {
  createStatusError,
  createTextResponse,
  getCreateCalls,
  setMockResponses,
} from '../../../mocks/anthropic.js';
import { agentRecord, systemRecord, userRecord } from '../../../helpers/fakes.js';

const EMPTY: ConversationContext = { summary: null, messages: [] };

function createProvider(timeoutMs = 1000, maxRetries = 1): AnthropicProvider {
  return new AnthropicProvider({
    completionModel: 'test-agent-model',
    classifierModel: 'test-classifier-model',
    summaryModel: 'test-summary-model',
    maxTokens: 400,
    classifierTemperature: 0,
    retry: { timeoutMs, maxRetries, baseDelayMs: 1 },
  });
}

describe('AnthropicProvider.complete', () => {
  it('sends the window as alternating turns with the summary in the system prompt', async () => {
    setMockResponses([createTextResponse('  Your order ships today.  ')]);
    const context: ConversationContext = {
      summary: { text: 'Earlier: billing question', coveredCount: 4, createdAt: 0 },
      messages: [
        agentRecord('general', 'Welcome'),
        userRecord('Hi'),
        agentRecord('general', 'Hello'),
        systemRecord('Customer verified'),
      ],
    };

    const text = await createProvider().complete({
      operation: 'reply:general',
      system: 'You are general.',
      context,
      userText: 'Where is my order?',
      temperature: 0.3,
    });

    expect(text).toBe('Your order ships today.');
    const [call] = getCreateCalls();
    expect(call.model).toBe('test-agent-model');
    expect(call.max_tokens).toBe(400);
    expect(call.temperature).toBe(0.3);
    expect(call.system).toBe('You are general.\n\n<conversation_summary>\nEarlier: billing question\n</conversation_summary>');
    expect(call.messages).toEqual([
      { role: 'user', content: 'Hi' },
      { role: 'assistant', content: 'Hello' },
      { role: 'user', content: 'Where is my order?' },
    ]);
    expect(call.signal).toBeInstanceOf(AbortSignal);
  });

  it('uses the summary model for summaries', async () => {
    setMockResponses([createTextResponse('Short summary')]);

    await createProvider().complete({ operation: 'summary', system: 'Summarize.', context: EMPTY, userText: 'text' });

    expect(getCreateCalls()[0].model).toBe('test-summary-model');
  });

  it('retries a transient API error', async () => {
    setMockResponses([createStatusError(503), createTextResponse('Recovered')]);

    const text = await createProvider().complete({ operation: 'reply:sales', system: 's', context: EMPTY, userText: 'Hi' });

    expect(text).toBe('Recovered');
    expect(getCreateCalls()).toHaveLength(2);
  });

  it('fails without retrying when the reply has no text', async () => {
    setMockResponses([createTextResponse('   ')]);

    await expect(
      createProvider().complete({ operation: 'reply:general', system: 's', context: EMPTY, userText: 'Hi' })
    ).rejects.toThrow('reply:general returned no text');
    expect(getCreateCalls()).toHaveLength(1);
  });

  it('times out a call that never answers', async () => {
    setMockResponses(['hang']);

    await expect(
      createProvider(20, 0).complete({ operation: 'reply:general', system: 's', context: EMPTY, userText: 'Hi' })
    ).rejects.toThrow('reply:general failed after 1 attempt(s): reply:general timed out after 20ms');
  });
});

describe('AnthropicProvider.classify', () => {
  it('asks the classifier model and parses its reply', async () => {
    setMockResponses([
      createTextResponse(
        '```json\n{"label":"billing_issue","confidence":0.8,"candidates":[{"label":"purchase_inquiry","confidence":0.3},{"label":"billing_issue","confidence":0.8}]}\n```'
      ),
    ]);

    const result = await createProvider().classify({
      text: 'Why was I charged twice?',
      context: EMPTY,
      intents: intentOptionsFor(['billing_issue', 'purchase_inquiry']),
    });

    expect(result).toEqual({
      label: 'billing_issue',
      confidence: 0.8,
      candidates: [
        { label: 'billing_issue', confidence: 0.8 },
        { label: 'purchase_inquiry', confidence: 0.3 },
      ],
    });
    const [call] = getCreateCalls();
    expect(call.model).toBe('test-classifier-model');
    expect(call.temperature).toBe(0);
    expect(call.max_tokens).toBe(256);
    expect(call.messages).toEqual([{ role: 'user', content: 'Why was I charged twice?' }]);
    expect(call.system).toContain('  - billing_issue: Charges, invoices, payments and refunds on an existing account');
  });

  it('surfaces an unusable reply as ProviderError', async () => {
    setMockResponses([createTextResponse('I think it is billing')]);

    await expect(
      createProvider().classify({ text: 'Hi', context: EMPTY, intents: intentOptionsFor(['billing_issue']) })
    ).rejects.toThrow('Classifier returned invalid JSON');
  });
});

describe('parseClassification', () => {
  it('clamps confidence into 0..1', () => {
    expect(parseClassification('{"label":"technical_issue","confidence":1.4}')).toEqual({
      label: 'technical_issue',
      confidence: 1,
      candidates: [{ label: 'technical_issue', confidence: 1 }],
    });
  });

  it('drops malformed candidates', () => {
    const result = parseClassification(
      '{"label":"general_question","confidence":0.6,"candidates":[{"label":"x"},{"label":"billing_issue","confidence":0.2}]}'
    );

    expect(result.candidates).toEqual([
      { label: 'general_question', confidence: 0.6 },
      { label: 'billing_issue', confidence: 0.2 },
    ]);
  });

  it('rejects a reply without label or confidence', () => {
    expect(() => parseClassification('{"intent":"billing_issue"}')).toThrow(ProviderError);
    expect(() => parseClassification('{"intent":"billing_issue"}')).toThrow(
      'Classifier response is missing label or confidence'
    );
  });
});
