import { type PublicUser, type RefreshToken, type User } from './user';

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

/** Either the flag or a timestamp set by an external flow counts as verified. */
export function isEmailVerified(user: Pick<User, 'emailVerified' | 'emailVerifiedAt'>): boolean {
  return user.emailVerified || user.emailVerifiedAt !== null;
}

export function isAccountBlocked(user: Pick<User, 'isBanned' | 'studioStatus'>): boolean {
  return user.isBanned || user.studioStatus === 'blocked';
}

export function isTokenExpired(expiresAt: Date, now: Date): boolean {
  return expiresAt.getTime() <= now.getTime();
}

export function isRefreshTokenActive(token: RefreshToken, now: Date): boolean {
  return token.usedAt === null && token.revokedAt === null && !isTokenExpired(token.expiresAt, now);
}

export function toPublicUser(user: User): PublicUser {
  const { passwordHash: _hash, failedLoginAttempts: _attempts, lockedUntil: _lockedUntil, ...rest } = user;
  return rest;
}
