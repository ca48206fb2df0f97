/**
 * Conversation Window
 *
 * Keeps a dialog's retained messages within a fixed size. When the window
 * grows past the limit, the oldest excess records are folded into a single
 * summary that replaces any earlier one, so context stays bounded across an
 * unbounded number of turns.
 */

import type { ConversationContext, MessageRecord, SummaryRecord } from './types.js';
import type { Summarizer } from './summarizer.js';

export interface CompactionOptions {
  /** Maximum retained records after compaction */
  maxMessages: number;
  summarizer: Summarizer;
  now?: () => number;
  signal?: AbortSignal;
}

export interface CompactionResult {
  context: ConversationContext;

  /** Records removed from the window, oldest first */
  dropped: MessageRecord[];

  /** True when a new summary replaced the dropped range */
  compacted: boolean;
}

/**
 * Handler of the most recent agent-attributed record, or null.
 */
export function findLastAgentHandler(messages: readonly MessageRecord[]): string | null {
  for (let i = messages.length - 1; i >= 0; i--) {
    const message = messages[i];
    if (message.sender === 'agent' && message.handler) {
      return message.handler;
    }
  }
  return null;
}

/**
 * Compact the window to at most `maxMessages` records.
 *
 * The new summary covers the previous summary's records plus the dropped
 * ones. Returns the input unchanged when no compaction is needed.
 */
export async function compactContext(
  context: ConversationContext,
  options: CompactionOptions
): Promise<CompactionResult> {
  if (!Number.isInteger(options.maxMessages) || options.maxMessages < 1) {
    throw new RangeError(`maxMessages must be a positive integer, got ${options.maxMessages}`);
  }

  if (context.messages.length <= options.maxMessages) {
    return { context, dropped: [], compacted: false };
  }

  const excess = context.messages.length - options.maxMessages;
  const dropped = context.messages.slice(0, excess);
  const retained = context.messages.slice(excess);

  const text = await options.summarizer.summarize({
    previous: context.summary,
    dropped,
    signal: options.signal,
  });

  const summary: SummaryRecord = {
    text,
    coveredCount: (context.summary?.coveredCount ?? 0) + dropped.length,
    createdAt: (options.now ?? Date.now)(),
  };

  return { context: { summary, messages: retained }, dropped, compacted: true };
}

/**
 * Format conversation history for inclusion in prompts.
 * Agent lines carry the handler that wrote them.
 */
export function formatHistoryForPrompt(messages: readonly MessageRecord[]): string {
  if (messages.length === 0) {
    return '(No recent conversation history)';
  }

  return messages
    .map(m => {
      if (m.sender === 'user') return `Customer: ${m.text}`;
      if (m.sender === 'agent') return `Agent (${m.handler ?? 'unknown'}): ${m.text}`;
      return `System: ${m.text}`;
    })
    .join('\n');
}

/**
 * Get statistics about a conversation window.
 * Useful for debugging and observability.
 */
export function getWindowStats(context: ConversationContext): {
  messageCount: number;
  summarizedCount: number;
  oldestTimestamp: number | null;
  newestTimestamp: number | null;
} {
  const { messages } = context;
  return {
    messageCount: messages.length,
    summarizedCount: context.summary?.coveredCount ?? 0,
    oldestTimestamp: messages.length > 0 ? messages[0].timestamp : null,
    newestTimestamp: messages.length > 0 ? messages[messages.length - 1].timestamp : null,
  };
}
