/**
 * @fileoverview Request body validation for the dialogue API.
 */

import type { CreateDialogRequest, MessageRequest } from '../services/dialog/manager.js';
import type { CustomerInfo, DialogPriority } from '../services/dialog/types.js';
import type { Sender } from '../orchestrator/types.js';
import { ValidationError } from '../utils/errors.js';

/**
 * Field specification for validateInput.
 */
export interface FieldSpec {
  type: 'string' | 'number' | 'boolean' | 'array' | 'object';
  required: boolean;
  /** Reject empty/whitespace-only strings. Defaults to true for required strings. */
  nonEmpty?: boolean;
  /** Custom validator returning an error message or null if valid. */
  validate?: (value: unknown) => string | null;
}

export const PRIORITIES: readonly DialogPriority[] = ['low', 'normal', 'high', 'urgent'];
export const MESSAGE_TYPES: readonly Sender[] = ['user', 'agent', 'system'];

/**
 * Validate input fields against a specification.
 * Returns the first error message, or null if input is valid.
 */
export function validateInput(
  input: Record<string, unknown>,
  spec: Record<string, FieldSpec>
): string | null {
  for (const [field, fieldSpec] of Object.entries(spec)) {
    const value = input[field];

    if (fieldSpec.required) {
      if (value === undefined || value === null) {
        return `${field} is required.`;
      }
    } else if (value === undefined || value === null) {
      continue;
    }

    if (fieldSpec.type === 'array') {
      if (!Array.isArray(value)) {
        return `${field} must be an array.`;
      }
    } else if (fieldSpec.type === 'object') {
      if (typeof value !== 'object' || Array.isArray(value)) {
        return `${field} must be an object.`;
      }
    } else if (typeof value !== fieldSpec.type) {
      return `${field} must be a ${fieldSpec.type}.`;
    }

    const nonEmpty = fieldSpec.nonEmpty ?? (fieldSpec.required && fieldSpec.type === 'string');
    if (nonEmpty && typeof value === 'string' && !value.trim()) {
      return `${field} must be a non-empty string.`;
    }

    if (fieldSpec.validate) {
      const customError = fieldSpec.validate(value);
      if (customError) {
        return customError;
      }
    }
  }

  return null;
}

function maxLength(field: string, max: number): (value: unknown) => string | null {
  return value => (typeof value === 'string' && value.length > max ? `${field} must be at most ${max} characters.` : null);
}

function oneOf(field: string, allowed: readonly string[]): (value: unknown) => string | null {
  return value => (typeof value === 'string' && allowed.includes(value) ? null : `${field} must be one of: ${allowed.join(', ')}.`);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const CUSTOMER_SPEC: Record<string, FieldSpec> = {
  name: { type: 'string', required: true, validate: maxLength('customer.name', 100) },
  phone: {
    type: 'string',
    required: false,
    validate: value =>
      typeof value === 'string' && (value.length > 20 || !/\d/.test(value))
        ? 'customer.phone must be at most 20 characters and contain digits.'
        : null,
  },
  email: {
    type: 'string',
    required: false,
    validate: value =>
      typeof value === 'string' && (value.length > 100 || !value.includes('@'))
        ? 'customer.email must be at most 100 characters and contain "@".'
        : null,
  },
  customerId: { type: 'string', required: false, validate: maxLength('customer.customerId', 50) },
};

function fail(message: string, field?: string): never {
  throw new ValidationError(message, field ? { field } : undefined);
}

function requireBody(body: unknown): Record<string, unknown> {
  if (!isRecord(body)) {
    fail('Request body must be a JSON object.');
  }
  return body;
}

function parseCustomer(raw: Record<string, unknown>): CustomerInfo {
  const error = validateInput(raw, CUSTOMER_SPEC);
  if (error) fail(error, 'customer');

  const customer: CustomerInfo = { name: String(raw.name).trim() };
  if (typeof raw.phone === 'string') customer.phone = raw.phone;
  if (typeof raw.email === 'string') customer.email = raw.email;
  if (typeof raw.customerId === 'string') customer.customerId = raw.customerId;
  return customer;
}

function parsePriority(value: unknown): DialogPriority | undefined {
  return PRIORITIES.find(priority => priority === value);
}

function parseSender(value: unknown): Sender | undefined {
  return MESSAGE_TYPES.find(sender => sender === value);
}

/**
 * Validate a `POST /dialogue/create` body.
 *
 * @throws ValidationError describing the first invalid field
 */
export function parseCreateDialog(body: unknown, maxMessageLength: number): CreateDialogRequest {
  const input = requireBody(body);
  const error = validateInput(input, {
    customer: { type: 'object', required: true },
    initialMessage: { type: 'string', required: false, validate: maxLength('initialMessage', maxMessageLength) },
    source: { type: 'string', required: false, validate: maxLength('source', 50) },
    priority: { type: 'string', required: false, validate: oneOf('priority', PRIORITIES) },
  });
  if (error) fail(error);

  const customer = isRecord(input.customer) ? parseCustomer(input.customer) : fail('customer must be an object.', 'customer');
  const request: CreateDialogRequest = { customer };

  if (typeof input.initialMessage === 'string' && input.initialMessage.trim()) {
    request.initialMessage = input.initialMessage;
  }
  if (typeof input.source === 'string' && input.source.trim()) {
    request.source = input.source;
  }
  const priority = parsePriority(input.priority);
  if (priority) request.priority = priority;

  return request;
}

/**
 * Validate a `POST /dialogue/:dialogId/message` body.
 *
 * @throws ValidationError describing the first invalid field
 */
export function parseMessage(body: unknown, maxMessageLength: number): MessageRequest {
  const input = requireBody(body);
  const error = validateInput(input, {
    message: { type: 'string', required: true, validate: maxLength('message', maxMessageLength) },
    messageType: { type: 'string', required: false, validate: oneOf('messageType', MESSAGE_TYPES) },
    metadata: { type: 'object', required: false },
  });
  if (error) fail(error);

  const request: MessageRequest = {
    message: String(input.message),
    messageType: parseSender(input.messageType) ?? 'user',
  };
  if (isRecord(input.metadata)) {
    request.metadata = { ...input.metadata };
  }
  return request;
}

/**
 * Validate a `PATCH /agents/:name/availability` body.
 */
export function parseAvailability(body: unknown): boolean {
  const input = requireBody(body);
  const error = validateInput(input, { available: { type: 'boolean', required: true } });
  if (error) fail(error, 'available');
  return input.available === true;
}

/**
 * Parse a non-negative integer query parameter.
 */
export function parseCount(value: unknown, field: string, fallback: number): number {
  if (value === undefined) return fallback;
  if (typeof value !== 'string' || !/^\d+$/.test(value)) {
    fail(`${field} must be a non-negative integer.`, field);
  }
  return parseInt(value, 10);
}

/**
 * Parse a boolean flag query parameter ("true"/"1" are true).
 */
export function parseFlag(value: unknown): boolean {
  return value === 'true' || value === '1';
}
