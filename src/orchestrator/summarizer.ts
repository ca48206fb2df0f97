/**
 * Summarizers used by context compaction.
 *
 * The heuristic summarizer keeps each customer message's opening sentence
 * (the topic) and each agent reply's closing sentence (the resolution),
 * tagged with the handler. The provider summarizer asks the model and falls
 * back to the heuristic when the provider fails, so compaction never fails
 * a turn on its own.
 */

import type { MessageRecord, SummaryRecord } from './types.js';
import type { GenerationProvider } from '../services/provider/types.js';
import { SUMMARY_SYSTEM_PROMPT } from '../services/anthropic/prompts/index.js';
import { TurnCancelledError, errorMessage } from '../utils/errors.js';
import { createLogger, safeSnippet } from '../utils/observability/index.js';
import { formatHistoryForPrompt } from './conversation-window.js';

const logger = createLogger({ domain: 'summarizer' });

const DEFAULT_MAX_SUMMARY_LENGTH = 2000;
const LINE_SNIPPET_LENGTH = 160;

export interface SummarizeInput {
  previous: SummaryRecord | null;
  dropped: readonly MessageRecord[];
  signal?: AbortSignal;
}

export interface Summarizer {
  summarize(input: SummarizeInput): Promise<string>;
}

function sentences(text: string): string[] {
  return text
    .replace(/\s+/g, ' ')
    .trim()
    .split(/(?<=[.!?])\s+/)
    .filter(Boolean);
}

function firstSentence(text: string): string {
  return sentences(text)[0] ?? '';
}

function lastSentence(text: string): string {
  const all = sentences(text);
  return all[all.length - 1] ?? '';
}

export class HeuristicSummarizer implements Summarizer {
  constructor(private readonly maxLength = DEFAULT_MAX_SUMMARY_LENGTH) {}

  async summarize(input: SummarizeInput): Promise<string> {
    const lines: string[] = [];
    if (input.previous) {
      lines.push(input.previous.text);
    }

    for (const record of input.dropped) {
      if (record.sender === 'user') {
        lines.push(`Customer: ${safeSnippet(firstSentence(record.text), LINE_SNIPPET_LENGTH)}`);
      } else if (record.sender === 'agent') {
        lines.push(`[${record.handler ?? 'agent'}] ${safeSnippet(lastSentence(record.text), LINE_SNIPPET_LENGTH)}`);
      }
    }

    const text = lines.join('\n');
    if (text.length <= this.maxLength) {
      return text;
    }
    // Oldest content goes first
    return `...${text.slice(text.length - (this.maxLength - 3))}`;
  }
}

export class ProviderSummarizer implements Summarizer {
  constructor(
    private readonly provider: GenerationProvider,
    private readonly fallback: Summarizer = new HeuristicSummarizer()
  ) {}

  async summarize(input: SummarizeInput): Promise<string> {
    const existing = input.previous ? input.previous.text : '(none)';
    const transcript = `Existing summary:\n${existing}\n\nMessages to fold in:\n${formatHistoryForPrompt(input.dropped)}`;

    try {
      return await this.provider.complete({
        operation: 'summary',
        system: SUMMARY_SYSTEM_PROMPT,
        context: { summary: null, messages: [] },
        userText: transcript,
        temperature: 0,
        signal: input.signal,
      });
    } catch (error) {
      if (error instanceof TurnCancelledError) {
        throw error;
      }
      logger.warn('summary_fallback', { error: errorMessage(error), count: input.dropped.length });
      return this.fallback.summarize(input);
    }
  }
}
