/**
 * Prompt builders for the Anthropic provider.
 */

export { buildClassificationPrompt } from './classification.js';
export { SUMMARY_SYSTEM_PROMPT } from './summary.js';
