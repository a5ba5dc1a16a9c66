import { describe, it, expect } from 'vitest';
import { errorMessage, sanitize } from '../logger';

describe('sanitize', () => {
  it('redacts credential and personal keys regardless of case', () => {
    expect(
      sanitize({ userId: '42', Email: 'alice@example.com', refreshToken: 'r', passwordHash: 'h', code: '123456' }),
    ).toEqual({
      userId: '42',
      Email: '[REDACTED]',
      refreshToken: '[REDACTED]',
      passwordHash: '[REDACTED]',
      code: '[REDACTED]',
    });
  });

  it('recurses into nested objects and arrays', () => {
    expect(sanitize({ request: { ip: '10.0.0.1', path: '/auth/login' }, items: [{ token: 't' }, 3] })).toEqual({
      request: { ip: '[REDACTED]', path: '/auth/login' },
      items: [{ token: '[REDACTED]' }, 3],
    });
  });

  it('leaves dates untouched', () => {
    const lockedUntil = new Date('2026-03-02T10:15:00.000Z');
    expect(sanitize({ lockedUntil })).toEqual({ lockedUntil });
  });
});

describe('errorMessage', () => {
  it('keeps only the message of an Error', () => {
    expect(errorMessage(new Error('connection refused'))).toBe('connection refused');
  });

  it('stringifies anything else', () => {
    expect(errorMessage('timeout')).toBe('timeout');
    expect(errorMessage(42)).toBe('42');
  });
});
