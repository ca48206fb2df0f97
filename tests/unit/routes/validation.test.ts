import { describe, it, expect } from 'vitest';
import {
  parseAvailability,
  parseCount,
  parseCreateDialog,
  parseFlag,
  parseMessage,
  validateInput,
} from '../../../src/routes/validation.js';
import { ValidationError } from '../../../src/utils/errors.js';

function errorOf(fn: () => unknown): ValidationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ValidationError) return error;
    throw error;
  }
  throw new Error('expected a ValidationError');
}

describe('validateInput', () => {
  it('reports the first missing required field', () => {
    expect(validateInput({}, { a: { type: 'string', required: true } })).toBe('a is required.');
  });

  it('rejects whitespace-only required strings', () => {
    expect(validateInput({ a: '  ' }, { a: { type: 'string', required: true } })).toBe('a must be a non-empty string.');
  });

  it('checks types and skips absent optional fields', () => {
    expect(validateInput({ a: 1 }, { a: { type: 'string', required: false } })).toBe('a must be a string.');
    expect(validateInput({ a: [] }, { a: { type: 'object', required: false } })).toBe('a must be an object.');
    expect(validateInput({}, { a: { type: 'array', required: false } })).toBeNull();
  });
});

describe('parseCreateDialog', () => {
  it('accepts a full request', () => {
    const request = parseCreateDialog(
      {
        customer: { name: ' Ada ', phone: '+1 555 0100', email: 'ada@example.com', customerId: 'c-1' },
        initialMessage: 'Hello',
        source: 'web',
        priority: 'urgent',
      },
      100
    );

    expect(request).toEqual({
      customer: { name: 'Ada', phone: '+1 555 0100', email: 'ada@example.com', customerId: 'c-1' },
      initialMessage: 'Hello',
      source: 'web',
      priority: 'urgent',
    });
  });

  it('drops a blank initial message', () => {
    expect(parseCreateDialog({ customer: { name: 'Ada' }, initialMessage: '   ' }, 100)).toEqual({
      customer: { name: 'Ada' },
    });
  });

  it('rejects a missing customer name', () => {
    const error = errorOf(() => parseCreateDialog({ customer: {} }, 100));
    expect(error.message).toBe('name is required.');
    expect(error.context).toEqual({ field: 'customer' });
  });

  it('rejects a malformed email and phone', () => {
    expect(errorOf(() => parseCreateDialog({ customer: { name: 'Ada', email: 'nope' } }, 100)).message).toBe(
      'customer.email must be at most 100 characters and contain "@".'
    );
    expect(errorOf(() => parseCreateDialog({ customer: { name: 'Ada', phone: 'call me' } }, 100)).message).toBe(
      'customer.phone must be at most 20 characters and contain digits.'
    );
  });

  it('rejects an unknown priority and an overlong message', () => {
    expect(errorOf(() => parseCreateDialog({ customer: { name: 'Ada' }, priority: 'asap' }, 100)).message).toBe(
      'priority must be one of: low, normal, high, urgent.'
    );
    expect(errorOf(() => parseCreateDialog({ customer: { name: 'Ada' }, initialMessage: 'x'.repeat(11) }, 10)).message).toBe(
      'initialMessage must be at most 10 characters.'
    );
  });

  it('rejects a non-object body', () => {
    expect(errorOf(() => parseCreateDialog('hello', 100)).message).toBe('Request body must be a JSON object.');
  });
});

describe('parseMessage', () => {
  it('defaults the message type to user', () => {
    expect(parseMessage({ message: 'Hi' }, 100)).toEqual({ message: 'Hi', messageType: 'user' });
  });

  it('keeps metadata and an explicit type', () => {
    expect(parseMessage({ message: 'Note', messageType: 'system', metadata: { by: 'crm' } }, 100)).toEqual({
      message: 'Note',
      messageType: 'system',
      metadata: { by: 'crm' },
    });
  });

  it('rejects empty messages and unknown types', () => {
    expect(errorOf(() => parseMessage({ message: '' }, 100)).message).toBe('message must be a non-empty string.');
    expect(errorOf(() => parseMessage({ message: 'Hi', messageType: 'bot' }, 100)).message).toBe(
      'messageType must be one of: user, agent, system.'
    );
    expect(errorOf(() => parseMessage({ message: 'Hi', metadata: 'x' }, 100)).message).toBe(
      'metadata must be an object.'
    );
  });
});

describe('query and small body parsers', () => {
  it('parses availability', () => {
    expect(parseAvailability({ available: false })).toBe(false);
    expect(errorOf(() => parseAvailability({ available: 'no' })).message).toBe('available must be a boolean.');
  });

  it('parses counts with a fallback', () => {
    expect(parseCount(undefined, 'olderThanDays', 30)).toBe(30);
    expect(parseCount('7', 'olderThanDays', 30)).toBe(7);
    expect(errorOf(() => parseCount('-1', 'olderThanDays', 30)).message).toBe(
      'olderThanDays must be a non-negative integer.'
    );
  });

  it('parses flags', () => {
    expect(parseFlag('true')).toBe(true);
    expect(parseFlag('1')).toBe(true);
    expect(parseFlag('yes')).toBe(false);
    expect(parseFlag(undefined)).toBe(false);
  });
});
