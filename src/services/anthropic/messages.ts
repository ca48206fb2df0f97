/**
 * Conversion from conversation records to Messages API parameters.
 *
 * The API wants alternating user/assistant turns starting with a user turn.
 * System records are dropped here; they are operator notes, not dialogue.
 */

import type { MessageParam } from '@anthropic-ai/sdk/resources/messages';
import type { ConversationContext } from '../../orchestrator/types.js';

export function toMessageParams(context: ConversationContext, userText: string): MessageParam[] {
  const turns: Array<{ role: 'user' | 'assistant'; content: string }> = [];

  const push = (role: 'user' | 'assistant', content: string): void => {
    const last = turns[turns.length - 1];
    if (last && last.role === role) {
      last.content = `${last.content}\n\n${content}`;
      return;
    }
    turns.push({ role, content });
  };

  for (const record of context.messages) {
    if (record.sender === 'system') continue;
    push(record.sender === 'user' ? 'user' : 'assistant', record.text);
  }
  push('user', userText);

  while (turns.length > 0 && turns[0].role === 'assistant') {
    turns.shift();
  }

  return turns;
}

/**
 * Render the summary (if any) as a system prompt suffix.
 */
export function summaryBlock(context: ConversationContext): string {
  if (!context.summary) return '';
  return `\n\n<conversation_summary>\n${context.summary.text}\n</conversation_summary>`;
}
