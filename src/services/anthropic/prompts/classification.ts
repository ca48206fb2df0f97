/**
 * Intent classification prompt.
 */

import type { ConversationContext } from '../../../orchestrator/types.js';
import type { IntentOption } from '../../provider/types.js';
import { formatHistoryForPrompt } from '../../../orchestrator/conversation-window.js';

/** Only the tail of the window is shown to the classifier. */
const CLASSIFIER_HISTORY_MESSAGES = 6;

export function buildClassificationPrompt(
  intents: readonly IntentOption[],
  context: ConversationContext
): string {
  const catalog = intents
    .map(intent => `  - ${intent.label}: ${intent.description}`)
    .join('\n');

  const summary = context.summary
    ? `\n<conversation_summary>\n${context.summary.text}\n</conversation_summary>\n`
    : '';

  const history = formatHistoryForPrompt(context.messages.slice(-CLASSIFIER_HISTORY_MESSAGES));

  return `You classify customer messages for a call center.

Choose the single intent that best matches the customer's latest message.

<intents>
${catalog}
</intents>
${summary}
<recent_conversation>
${history}
</recent_conversation>

Respond with ONLY a JSON object, no other text:
{"label": "<intent label>", "confidence": <0.0-1.0>, "candidates": [{"label": "<intent label>", "confidence": <0.0-1.0>}]}

Rules:
- "label" must be one of the intent labels above.
- "candidates" lists every plausible intent, best first, including the chosen one.
- Use a low confidence when the message fits no intent well.`;
}
