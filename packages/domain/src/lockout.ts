import { type User } from './user';

export type LockoutState = Pick<User, 'failedLoginAttempts' | 'lockedUntil'>;

export interface LockoutPolicy {
  maxFailedAttempts: number;
  lockoutDurationMs: number;
}

export const DEFAULT_LOCKOUT_POLICY: LockoutPolicy = {
  maxFailedAttempts: 5,
  lockoutDurationMs: 15 * 60 * 1000,
};

export function isLocked(state: LockoutState, now: Date): boolean {
  return state.lockedUntil !== null && state.lockedUntil.getTime() > now.getTime();
}

function lockWindowElapsed(state: LockoutState, now: Date): boolean {
  return state.lockedUntil !== null && state.lockedUntil.getTime() <= now.getTime();
}

export function registerFailure(state: LockoutState, now: Date, policy: LockoutPolicy): LockoutState {
  const previous = lockWindowElapsed(state, now) ? 0 : state.failedLoginAttempts;
  const failedLoginAttempts = previous + 1;

  if (failedLoginAttempts >= policy.maxFailedAttempts) {
    return {
      failedLoginAttempts,
      lockedUntil: new Date(now.getTime() + policy.lockoutDurationMs),
    };
  }
  return { failedLoginAttempts, lockedUntil: null };
}

/** Returns null when there is nothing to clear, so callers can skip the write. */
export function registerSuccess(state: LockoutState): LockoutState | null {
  if (state.failedLoginAttempts === 0 && state.lockedUntil === null) return null;
  return { failedLoginAttempts: 0, lockedUntil: null };
}
