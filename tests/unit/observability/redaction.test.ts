import { describe, expect, it } from 'vitest';
import { redactEmail, redactPhone, redactSecrets, safeSnippet } from '../../../src/utils/observability/index.js';

describe('observability redaction', () => {
  it('masks phone numbers to last 4 digits', () => {
    expect(redactPhone('+15551234567')).toBe('***4567');
  });

  it('keeps only the domain of an email', () => {
    expect(redactEmail('ada@example.com')).toBe('***@example.com');
  });

  it('redacts sensitive keys and message content', () => {
    const input = {
      phone: '+15551234567',
      accessToken: 'abc123',
      message: 'My invoice for March is wrong',
      customer: { name: 'Ada Lovelace', email: 'ada@example.com' },
      nested: {
        client_secret: 'my-secret',
      },
    };

    const redacted = redactSecrets(input);

    expect(redacted.phone).toBe('***4567');
    expect(redacted.accessToken).toBe('[REDACTED]');
    expect(redacted.message).toBe(`[REDACTED_TEXT len=${input.message.length}]`);
    expect(redacted.customer).toEqual({ name: '[REDACTED_TEXT len=12]', email: '***@example.com' });
    expect(redacted.nested).toEqual({ client_secret: '[REDACTED]' });
  });

  it('masks contact details inside free text', () => {
    expect(redactSecrets({ note: 'reach me at ada@example.com or +1 555 123 4567' })).toEqual({
      note: 'reach me at ***@example.com or ***4567',
    });
  });

  it('collapses content arrays to their length', () => {
    expect(redactSecrets({ messages: ['a', 'b', 'c'] })).toEqual({ messages: '[REDACTED_ARRAY len=3]' });
  });

  it('truncates long snippets safely', () => {
    const value = 'x'.repeat(200);
    const snippet = safeSnippet(value, 20);
    expect(snippet).toBe('xxxxxxxxxxxxxxxxxxxx...(truncated)');
  });
});
