import { describe, expect, it } from 'vitest';

import { sanitize } from '../config/logger.js';

describe('log payload sanitizing', () => {
  it('redacts secret-looking keys at any depth', () => {
    expect(
      sanitize({ password: 'test-secret', nested: { api_key: 'test-key', ok: 1 }, list: [1, 2] })
    ).toEqual({ password: '[REDACTED]', nested: { api_key: '[REDACTED]', ok: 1 }, list: [1, 2] });
  });

  it('breaks circular references', () => {
    const payload: Record<string, unknown> = { name: 'a' };
    payload.self = payload;

    expect(sanitize(payload)).toEqual({ name: 'a', self: '[CIRCULAR]' });
  });

  it('truncates oversized strings', () => {
    expect(sanitize('x'.repeat(5000))).toBe(`${'x'.repeat(4096)}...[truncated 904 chars]`);
  });

  it('flattens errors to name and message', () => {
    expect(sanitize(new Error('boom'))).toMatchObject({ name: 'Error', message: 'boom' });
  });
});
