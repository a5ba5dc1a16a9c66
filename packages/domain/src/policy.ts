import { DEFAULT_LOCKOUT_POLICY, type LockoutPolicy } from './lockout';

export interface AuthPolicy {
  lockout: LockoutPolicy;
  accessTokenTtlSeconds: number;
  refreshTokenTtlMs: number;
  refreshTokensPerUser: number;
  verificationCodeTtlMs: number;
  verificationResendCooldownMs: number;
  maxVerificationAttempts: number;
}

export const DEFAULT_AUTH_POLICY: AuthPolicy = {
  lockout: DEFAULT_LOCKOUT_POLICY,
  accessTokenTtlSeconds: 900,
  refreshTokenTtlMs: 168 * 60 * 60 * 1000,
  refreshTokensPerUser: 10,
  verificationCodeTtlMs: 5 * 60 * 1000,
  verificationResendCooldownMs: 60 * 1000,
  maxVerificationAttempts: 5,
};
