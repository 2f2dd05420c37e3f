import { describe, expect, it } from 'vitest';
import { redactSecrets, safeSnippet } from '../../../src/utils/observability/index.js';

describe('redactSecrets', () => {
  it('masks secret-looking keys at any depth', () => {
    expect(redactSecrets({
      token: 'abc',
      nested: { password: 'pw', authorization: 'Bearer x', keep: 'visible' },
    })).toEqual({
      token: '[REDACTED]',
      nested: { password: '[REDACTED]', authorization: '[REDACTED]', keep: 'visible' },
    });
  });

  it('replaces prompt-sized content with its length', () => {
    expect(redactSecrets({
      system: 'You are an assistant.',
      transcript: [{ role: 'user' }, { role: 'assistant' }],
    })).toEqual({
      system: '[REDACTED_TEXT len=21]',
      transcript: '[REDACTED_ARRAY len=2]',
    });
  });

  it('masks inline API keys in free text', () => {
    expect(redactSecrets('failed with sk-ant-test1234567890 attached')).toBe('failed with [REDACTED_KEY] attached');
  });

  it('summarizes errors', () => {
    const redacted = redactSecrets({ error: new Error('boom') });

    expect(redacted.error).toEqual({ name: 'Error', message: 'boom', stack: undefined });
  });

  it('leaves numbers and booleans alone', () => {
    expect(redactSecrets({ count: 3, ok: true, none: null })).toEqual({ count: 3, ok: true, none: null });
  });
});

describe('safeSnippet', () => {
  it('returns short strings unchanged', () => {
    expect(safeSnippet('short')).toBe('short');
  });

  it('truncates long strings', () => {
    expect(safeSnippet('abcdefghij', 4)).toBe('abcd...(truncated)');
  });
});
