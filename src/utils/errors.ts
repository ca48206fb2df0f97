/**
 * @fileoverview Standardized error handling utilities.
 *
 * Provides consistent error patterns across the codebase:
 * - AppError: Base class for application-specific errors
 * - One subclass per failure kind the turn engine and its collaborators raise
 * - withErrorContext: Wraps operations with consistent error logging
 */

import { createLogger } from './observability/index.js';

const logger = createLogger({ domain: 'errors' });

/**
 * Base class for application-specific errors.
 * Includes error code, recoverability flag, and optional context.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly recoverable: boolean = false,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/**
 * No available handler could be selected (the default handler included).
 */
export class RoutingError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'ROUTING_FAILED', false, context);
    this.name = 'RoutingError';
  }
}

/**
 * Reroute bound exceeded. Resolved inside the orchestrator by forcing
 * escalation; only ever logged.
 */
export class HandoffLoopError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'HANDOFF_LOOP', true, context);
    this.name = 'HandoffLoopError';
  }
}

/**
 * Generation/classification provider failed after retries were exhausted,
 * timed out, or returned something unusable.
 */
export class ProviderError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'PROVIDER_FAILED', true, context);
    this.name = 'ProviderError';
  }
}

/**
 * Self-handoff or handoff to an unknown/unavailable handler.
 * Resolved inside the orchestrator; only ever logged.
 */
export class InvalidTransitionError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'INVALID_TRANSITION', true, context);
    this.name = 'InvalidTransitionError';
  }
}

export class NotFoundError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'NOT_FOUND', false, context);
    this.name = 'NotFoundError';
  }
}

export class StorageError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'STORAGE_FAILED', true, context);
    this.name = 'StorageError';
  }
}

export class ValidationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'VALIDATION_FAILED', false, context);
    this.name = 'ValidationError';
  }
}

/**
 * Operation not allowed in the dialog's current status.
 */
export class DialogError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'DIALOG_STATE', false, context);
    this.name = 'DialogError';
  }
}

export class TurnCancelledError extends AppError {
  constructor(message = 'Turn was cancelled', context?: Record<string, unknown>) {
    super(message, 'TURN_CANCELLED', true, context);
    this.name = 'TurnCancelledError';
  }
}

/**
 * Render an unknown thrown value as a message string.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Execute an async function with consistent error logging.
 * Errors are logged and re-thrown for the caller to handle.
 */
export async function withErrorContext<T>(
  fn: () => Promise<T>,
  context: string
): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    logger.error('operation_failed', {
      operation: context,
      errorCode: error instanceof AppError ? error.code : undefined,
      error: errorMessage(error),
    });
    throw error;
  }
}
