import { describe, it, expect } from 'vitest';
import { KeywordProvider, UNKNOWN_INTENT } from '../../../../src/services/provider/keyword.js';
import { INTENT_CATALOG, intentOptionsFor } from '../../../../src/agents/intents.js';

const EMPTY = { summary: null, messages: [] };
const ALL_INTENTS = intentOptionsFor(Object.keys(INTENT_CATALOG));

describe('KeywordProvider', () => {
  const provider = new KeywordProvider();

  describe('classify', () => {
    it('picks the intent with the most keyword hits', async () => {
      const result = await provider.classify({
        text: 'I was charged twice and want a refund',
        context: EMPTY,
        intents: ALL_INTENTS,
      });

      expect(result).toEqual({
        label: 'billing_issue',
        confidence: 1,
        candidates: [{ label: 'billing_issue', confidence: 1 }],
      });
    });

    it('splits confidence across matching intents', async () => {
      const result = await provider.classify({
        text: 'My wifi password is not working',
        context: EMPTY,
        intents: ALL_INTENTS,
      });

      expect(result.label).toBe('technical_issue');
      expect(result.confidence).toBe(2 / 3);
      expect(result.candidates).toEqual([
        { label: 'technical_issue', confidence: 2 / 3 },
        { label: 'account_access', confidence: 1 / 3 },
      ]);
    });

    it('only scores the intents it is offered', async () => {
      const result = await provider.classify({
        text: 'My wifi password is not working',
        context: EMPTY,
        intents: intentOptionsFor(['account_access']),
      });

      expect(result.label).toBe('account_access');
      expect(result.confidence).toBe(1);
    });

    it('returns the unknown label when nothing matches', async () => {
      const result = await provider.classify({ text: 'Hello', context: EMPTY, intents: ALL_INTENTS });

      expect(result).toEqual({ label: UNKNOWN_INTENT, confidence: 0, candidates: [{ label: UNKNOWN_INTENT, confidence: 0 }] });
    });
  });

  describe('complete', () => {
    it('acknowledges on behalf of the replying desk', async () => {
      const text = await provider.complete({
        operation: 'reply:sales',
        system: 'You are the sales team.',
        context: EMPTY,
        userText: 'How much is it?',
      });

      expect(text).toBe('Thanks for your message. The sales desk has noted your request and will follow up.');
    });

    it('condenses the transcript for summaries', async () => {
      const text = await provider.complete({
        operation: 'summary',
        system: 'Summarize.',
        context: EMPTY,
        userText: 'Customer: Hi\n\n  Agent (general): Hello',
      });

      expect(text).toBe('Customer: Hi Agent (general): Hello');
    });
  });
});
