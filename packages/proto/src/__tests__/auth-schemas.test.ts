import { describe, it, expect } from 'vitest';
import {
  EmailSchema,
  PasswordSchema,
  RegisterRequestSchema,
  LoginRequestSchema,
  RefreshRequestSchema,
  VerifyConfirmRequestSchema,
  SessionResponseSchema,
} from '../api/auth';

describe('EmailSchema', () => {
  it('normalizes to lowercase and trims', () => {
    expect(EmailSchema.parse('  Alice@Example.COM ')).toBe('alice@example.com');
  });

  it('rejects malformed addresses', () => {
    expect(() => EmailSchema.parse('alice')).toThrow();
    expect(() => EmailSchema.parse('alice@')).toThrow();
  });

  it('rejects overlong addresses', () => {
    expect(() => EmailSchema.parse(`${'a'.repeat(250)}@x.io`)).toThrow();
  });
});

describe('PasswordSchema', () => {
  it('rejects too short', () => {
    expect(() => PasswordSchema.parse('short')).toThrow();
  });

  it('rejects too long', () => {
    expect(() => PasswordSchema.parse('a'.repeat(129))).toThrow();
  });

  it('accepts valid password', () => {
    expect(PasswordSchema.parse('securepassword123')).toBe('securepassword123');
  });
});

describe('RegisterRequestSchema', () => {
  it('defaults the role to client', () => {
    const result = RegisterRequestSchema.parse({
      email: 'Alice@Example.com',
      password: 'password123',
      name: ' Alice ',
    });
    expect(result).toEqual({
      email: 'alice@example.com',
      password: 'password123',
      name: 'Alice',
      role: 'client',
    });
  });

  it('accepts a studio owner with a phone number', () => {
    const result = RegisterRequestSchema.parse({
      email: 'studio@example.com',
      password: 'password123',
      name: 'Core Studio',
      phone: '+1 (555) 010-0199',
      role: 'studio_owner',
    });
    expect(result.role).toBe('studio_owner');
    expect(result.phone).toBe('+1 (555) 010-0199');
  });

  it('refuses self-registration as admin', () => {
    expect(() =>
      RegisterRequestSchema.parse({
        email: 'root@example.com',
        password: 'password123',
        name: 'Root',
        role: 'admin',
      }),
    ).toThrow();
  });

  it('rejects a phone with letters', () => {
    expect(() =>
      RegisterRequestSchema.parse({
        email: 'alice@example.com',
        password: 'password123',
        name: 'Alice',
        phone: 'call me',
      }),
    ).toThrow();
  });
});

describe('LoginRequestSchema', () => {
  it('accepts a short password so old accounts can still log in', () => {
    const result = LoginRequestSchema.parse({ email: ' Alice@example.com ', password: 'pw' });
    expect(result).toEqual({ email: 'alice@example.com', password: 'pw' });
  });

  it('rejects an empty password', () => {
    expect(() => LoginRequestSchema.parse({ email: 'alice@example.com', password: '' })).toThrow();
  });
});

describe('RefreshRequestSchema', () => {
  it('validates refresh token request', () => {
    expect(RefreshRequestSchema.parse({ refreshToken: 'some-opaque-token' })).toEqual({
      refreshToken: 'some-opaque-token',
    });
  });

  it('rejects empty refresh token', () => {
    expect(() => RefreshRequestSchema.parse({ refreshToken: '' })).toThrow();
  });
});

describe('VerifyConfirmRequestSchema', () => {
  it('accepts six digits', () => {
    expect(VerifyConfirmRequestSchema.parse({ email: 'alice@example.com', code: ' 042517 ' }).code).toBe('042517');
  });

  it('rejects anything else', () => {
    expect(() => VerifyConfirmRequestSchema.parse({ email: 'alice@example.com', code: '42517' })).toThrow();
    expect(() => VerifyConfirmRequestSchema.parse({ email: 'alice@example.com', code: 'abcdef' })).toThrow();
  });
});

describe('SessionResponseSchema', () => {
  it('accepts a login response', () => {
    const body = {
      accessToken: 'a.b.c',
      refreshToken: 'opaque',
      tokenType: 'Bearer',
      expiresIn: 900,
      user: {
        id: '1001',
        email: 'alice@example.com',
        name: 'Alice',
        phone: null,
        role: 'client',
        studioStatus: null,
        emailVerified: true,
        createdAt: '2026-03-02T10:00:00.000Z',
      },
    };
    expect(SessionResponseSchema.parse(body)).toEqual(body);
  });
});
