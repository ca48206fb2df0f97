/**
 * @fileoverview Error → HTTP response mapping.
 *
 * Every route failure ends here. Bodies have the shape
 * `{ error: { type, message, details } }`; unexpected errors hide their
 * message in production.
 */

import type { ErrorRequestHandler, Response } from 'express';
import config from '../config.js';
import {
  AppError,
  DialogError,
  NotFoundError,
  ProviderError,
  RoutingError,
  StorageError,
  TurnCancelledError,
  ValidationError,
  errorMessage,
} from '../utils/errors.js';
import { createLogger } from '../utils/observability/index.js';

const logger = createLogger({ domain: 'http' });

/** Status used when the client went away before the turn finished */
export const CLIENT_CLOSED_REQUEST = 499;

export function statusFor(error: unknown): number {
  if (error instanceof ValidationError) return 400;
  if (error instanceof NotFoundError) return 404;
  if (error instanceof DialogError) return 409;
  if (error instanceof TurnCancelledError) return CLIENT_CLOSED_REQUEST;
  if (error instanceof ProviderError || error instanceof RoutingError) return 503;
  if (error instanceof StorageError) return 500;
  return 500;
}

export interface ErrorBody {
  error: {
    type: string;
    message: string;
    details: Record<string, unknown> | null;
  };
}

export function toErrorBody(error: unknown, production = config.nodeEnv === 'production'): ErrorBody {
  if (error instanceof AppError) {
    const hidden = production && statusFor(error) >= 500;
    return {
      error: {
        type: error.code,
        message: hidden ? 'Service temporarily unavailable' : error.message,
        details: hidden ? null : error.context ?? null,
      },
    };
  }

  return {
    error: {
      type: 'INTERNAL_ERROR',
      message: production ? 'Internal server error' : errorMessage(error),
      details: null,
    },
  };
}

export function sendError(res: Response, error: unknown): void {
  const status = statusFor(error);
  if (status >= 500) {
    logger.error('request_failed', {
      status,
      errorCode: error instanceof AppError ? error.code : undefined,
      error: errorMessage(error),
    });
  } else {
    logger.warn('request_rejected', {
      status,
      errorCode: error instanceof AppError ? error.code : undefined,
      error: errorMessage(error),
    });
  }

  if (res.headersSent || res.writableEnded) {
    return;
  }
  res.status(status).json(toErrorBody(error));
}

/**
 * Final Express error handler (also catches malformed JSON bodies).
 */
export const errorHandler: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
  if (err instanceof SyntaxError) {
    sendError(res, new ValidationError('Request body is not valid JSON.'));
    return;
  }
  sendError(res, err);
};
