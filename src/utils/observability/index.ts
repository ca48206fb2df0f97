export type * from './types.js';

export {
  createRequestId,
  resolveRequestId,
  withLogContext,
  getLogContext,
} from './context.js';

export {
  createLogger,
  initObservability,
} from './logger.js';

export {
  redactEmail,
  redactPhone,
  redactSecrets,
  safeSnippet,
} from './redaction.js';
