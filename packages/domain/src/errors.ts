export type AuthErrorKind =
  | 'INVALID_CREDENTIALS'
  | 'DUPLICATE_EMAIL'
  | 'ACCOUNT_LOCKED'
  | 'ACCOUNT_BANNED'
  | 'EMAIL_NOT_VERIFIED'
  | 'CODE_INVALID'
  | 'TOO_MANY_ATTEMPTS'
  | 'RESEND_TOO_SOON'
  | 'INVALID_REFRESH_TOKEN'
  | 'REFRESH_TOKEN_REUSED'
  | 'INTERNAL';

export class AuthError extends Error {
  constructor(
    public readonly kind: AuthErrorKind,
    message: string,
    public readonly safeMeta: Record<string, unknown> = {},
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'AuthError';
  }
}

/**
 * Store, transport and cancellation failures all leave the core as
 * INTERNAL; the original error is only reachable through `cause`.
 */
export function toAuthError(err: unknown): AuthError {
  if (err instanceof AuthError) return err;
  return new AuthError('INTERNAL', 'Internal error', {}, { cause: err });
}

export function accountLocked(lockedUntil: Date | null): AuthError {
  return new AuthError('ACCOUNT_LOCKED', 'Account is temporarily locked', {
    lockedUntil: lockedUntil?.toISOString() ?? null,
  });
}

export type Outcome<T> = { ok: true; value: T } | { ok: false; error: AuthError };

export function succeed<T>(value: T): Outcome<T> {
  return { ok: true, value };
}

export function reject<T>(error: AuthError): Outcome<T> {
  return { ok: false, error };
}

/** Outcomes let a transaction commit its bookkeeping and still fail the call. */
export function unwrap<T>(outcome: Outcome<T>): T {
  if (!outcome.ok) throw outcome.error;
  return outcome.value;
}
