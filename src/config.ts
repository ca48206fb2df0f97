/**
 * @fileoverview Centralized application configuration.
 *
 * All environment variables are loaded and validated here. This provides
 * a single source of truth for configuration and makes it easy to see
 * what external configuration the service requires.
 *
 * @see .env.example for the supported environment variables
 */

import 'dotenv/config';

// ---------------------------------------------------------------------------
// Config helpers — make required vs optional intent explicit
// ---------------------------------------------------------------------------

/** Read a required env var. Returns undefined if missing (caught by validateConfig). */
function required(key: string): string | undefined {
  return process.env[key];
}

/** Read an optional string env var with a default. */
function optional(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

/** Read an optional integer env var with a default. */
function optionalInt(key: string, defaultValue: number): number {
  const raw = process.env[key];
  return raw ? parseInt(raw, 10) : defaultValue;
}

/** Read an optional float env var with a default. */
function optionalFloat(key: string, defaultValue: number): number {
  const raw = process.env[key];
  return raw ? parseFloat(raw) : defaultValue;
}

/** Read an optional boolean env var (defaults to `defaultValue`). */
function optionalBool(key: string, defaultValue: boolean): boolean {
  const raw = process.env[key];
  if (raw === undefined) return defaultValue;
  return raw !== (defaultValue ? 'false' : 'true') ? defaultValue : !defaultValue;
}

/** Read a comma-separated list. */
function optionalList(key: string): string[] {
  const raw = process.env[key];
  if (!raw) return [];
  return raw.split(',').map((item) => item.trim()).filter(Boolean);
}

/** Return a path that differs between dev and production. */
function dbPath(envKey: string, prodPath: string, devPath: string): string {
  return process.env[envKey] || (process.env.NODE_ENV === 'production' ? prodPath : devPath);
}

function storeProvider(): 'sqlite' | 'memory' {
  return optional('DIALOG_STORE_PROVIDER', 'sqlite') === 'memory' ? 'memory' : 'sqlite';
}

function summaryMode(): 'heuristic' | 'llm' {
  return optional('SUMMARY_MODE', 'heuristic') === 'llm' ? 'llm' : 'heuristic';
}

// ---------------------------------------------------------------------------
// Config object
// ---------------------------------------------------------------------------

const config = {
  appName: optional('APP_NAME', 'Switchboard Agents'),
  appVersion: optional('APP_VERSION', '0.1.0'),
  port: optionalInt('PORT', 8000),
  nodeEnv: optional('NODE_ENV', 'development'),
  apiPrefix: optional('API_PREFIX', '/api/v1'),
  anthropicApiKey: required('ANTHROPIC_API_KEY'),

  /** Offline keyword provider instead of the Anthropic API */
  useMockLlm: optionalBool('USE_MOCK_LLM', false),

  /** Claude model IDs - centralized to avoid hardcoding across files */
  models: {
    classifier: optional('CLASSIFIER_MODEL_ID', 'claude-3-5-haiku-20241022'),
    agent: optional('AGENT_MODEL_ID', 'claude-3-5-sonnet-20241022'),
    summary: optional('SUMMARY_MODEL_ID', 'claude-3-5-haiku-20241022'),
    maxTokens: optionalInt('LLM_MAX_TOKENS', 1000),
  },

  /** Sampling temperature per handler (router stays deterministic) */
  temperatures: {
    router: optionalFloat('ROUTER_TEMPERATURE', 0),
    general: optionalFloat('GENERAL_TEMPERATURE', 0.3),
    sales: optionalFloat('SALES_TEMPERATURE', 0.4),
    technical: optionalFloat('TECHNICAL_TEMPERATURE', 0.2),
    escalation: optionalFloat('ESCALATION_TEMPERATURE', 0.3),
  },

  /** Provider call limits */
  provider: {
    timeoutMs: optionalInt('PROVIDER_TIMEOUT_MS', 30000),
    maxRetries: optionalInt('PROVIDER_MAX_RETRIES', 2),
    retryBaseMs: optionalInt('PROVIDER_RETRY_BASE_MS', 500),
  },

  /** Dialog storage configuration */
  dialogs: {
    provider: storeProvider(),
    sqlitePath: dbPath('DIALOG_DB_PATH', '/app/data/dialogs.db', './data/dialogs.db'),
    maxHistoryLength: optionalInt('MAX_DIALOG_HISTORY_LENGTH', 100),
    maxMessageLength: optionalInt('MAX_MESSAGE_LENGTH', 2000),
    timeoutMinutes: optionalInt('DIALOG_TIMEOUT_MINUTES', 30),
    closedRetentionDays: optionalInt('CLOSED_DIALOG_RETENTION_DAYS', 7),
    summaryMode: summaryMode(),
  },

  /** Background sweeper for idle dialogs */
  cleanup: {
    enabled: optionalBool('CLEANUP_ENABLED', true),
    intervalMs: optionalInt('CLEANUP_INTERVAL_MS', 300000),
  },

  /** Turn orchestration limits */
  orchestration: {
    confidenceThreshold: optionalFloat('ROUTING_CONFIDENCE_THRESHOLD', 0.5),
    maxReroutes: optionalInt('MAX_REROUTES', 3),
    maxUnresolvedTurns: optionalInt('MAX_UNRESOLVED_TURNS', 3),
    defaultHandler: optional('DEFAULT_HANDLER', 'general'),
    escalationHandler: optional('ESCALATION_HANDLER', 'escalation'),
    unavailableHandlers: optionalList('UNAVAILABLE_HANDLERS'),
  },
};

export type AppConfig = typeof config;

/**
 * Validate critical configuration at startup.
 * Throws if required values are missing or invalid.
 */
export function validateConfig(): void {
  const errors: string[] = [];

  if (!config.useMockLlm && !config.anthropicApiKey) {
    errors.push('ANTHROPIC_API_KEY is required unless USE_MOCK_LLM=true');
  }

  // Unparseable values parse to NaN, which passes every bound check below
  const integers: Array<[string, number]> = [
    ['PORT', config.port],
    ['LLM_MAX_TOKENS', config.models.maxTokens],
    ['PROVIDER_TIMEOUT_MS', config.provider.timeoutMs],
    ['PROVIDER_MAX_RETRIES', config.provider.maxRetries],
    ['PROVIDER_RETRY_BASE_MS', config.provider.retryBaseMs],
    ['MAX_DIALOG_HISTORY_LENGTH', config.dialogs.maxHistoryLength],
    ['MAX_MESSAGE_LENGTH', config.dialogs.maxMessageLength],
    ['DIALOG_TIMEOUT_MINUTES', config.dialogs.timeoutMinutes],
    ['CLOSED_DIALOG_RETENTION_DAYS', config.dialogs.closedRetentionDays],
    ['CLEANUP_INTERVAL_MS', config.cleanup.intervalMs],
    ['MAX_REROUTES', config.orchestration.maxReroutes],
    ['MAX_UNRESOLVED_TURNS', config.orchestration.maxUnresolvedTurns],
  ];
  for (const [key, value] of integers) {
    if (!Number.isInteger(value)) {
      errors.push(`${key} must be an integer, got ${process.env[key]}`);
    }
  }
  const floats: Array<[string, number]> = [
    ['ROUTING_CONFIDENCE_THRESHOLD', config.orchestration.confidenceThreshold],
    ['ROUTER_TEMPERATURE', config.temperatures.router],
    ['GENERAL_TEMPERATURE', config.temperatures.general],
    ['SALES_TEMPERATURE', config.temperatures.sales],
    ['TECHNICAL_TEMPERATURE', config.temperatures.technical],
    ['ESCALATION_TEMPERATURE', config.temperatures.escalation],
  ];
  for (const [key, value] of floats) {
    if (!Number.isFinite(value)) {
      errors.push(`${key} must be a number, got ${process.env[key]}`);
    }
  }

  // Numeric bounds
  if (config.port < 1 || config.port > 65535) {
    errors.push(`PORT must be 1-65535, got ${config.port}`);
  }
  if (!config.apiPrefix.startsWith('/')) {
    errors.push(`API_PREFIX must start with "/", got ${config.apiPrefix}`);
  }
  if (config.dialogs.maxHistoryLength < 2) {
    errors.push(`MAX_DIALOG_HISTORY_LENGTH must be >= 2, got ${config.dialogs.maxHistoryLength}`);
  }
  if (config.dialogs.maxMessageLength < 1) {
    errors.push(`MAX_MESSAGE_LENGTH must be >= 1, got ${config.dialogs.maxMessageLength}`);
  }
  if (config.models.maxTokens < 1) {
    errors.push(`LLM_MAX_TOKENS must be >= 1, got ${config.models.maxTokens}`);
  }
  if (config.dialogs.closedRetentionDays < 0) {
    errors.push(`CLOSED_DIALOG_RETENTION_DAYS must be >= 0, got ${config.dialogs.closedRetentionDays}`);
  }
  if (config.provider.retryBaseMs < 0) {
    errors.push(`PROVIDER_RETRY_BASE_MS must be >= 0, got ${config.provider.retryBaseMs}`);
  }
  if (config.dialogs.timeoutMinutes < 1) {
    errors.push(`DIALOG_TIMEOUT_MINUTES must be >= 1, got ${config.dialogs.timeoutMinutes}`);
  }
  if (config.cleanup.intervalMs < 1000) {
    errors.push(`CLEANUP_INTERVAL_MS must be >= 1000, got ${config.cleanup.intervalMs}`);
  }
  if (config.provider.timeoutMs < 100) {
    errors.push(`PROVIDER_TIMEOUT_MS must be >= 100, got ${config.provider.timeoutMs}`);
  }
  if (config.provider.maxRetries < 0 || config.provider.maxRetries > 5) {
    errors.push(`PROVIDER_MAX_RETRIES must be 0-5, got ${config.provider.maxRetries}`);
  }
  if (config.orchestration.confidenceThreshold < 0 || config.orchestration.confidenceThreshold > 1) {
    errors.push(`ROUTING_CONFIDENCE_THRESHOLD must be 0-1, got ${config.orchestration.confidenceThreshold}`);
  }
  if (config.orchestration.maxReroutes < 1) {
    errors.push(`MAX_REROUTES must be >= 1, got ${config.orchestration.maxReroutes}`);
  }
  if (config.orchestration.maxUnresolvedTurns < 1) {
    errors.push(`MAX_UNRESOLVED_TURNS must be >= 1, got ${config.orchestration.maxUnresolvedTurns}`);
  }
  if (config.orchestration.defaultHandler === config.orchestration.escalationHandler) {
    errors.push('DEFAULT_HANDLER and ESCALATION_HANDLER must differ');
  }

  if (errors.length > 0) {
    console.error(JSON.stringify({
      level: 'fatal',
      message: 'Configuration validation failed',
      errors,
      timestamp: new Date().toISOString(),
    }));
    throw new Error(`Configuration validation failed:\n  - ${errors.join('\n  - ')}`);
  }
}

export default config;
