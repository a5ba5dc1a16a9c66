import { type SafeLogger } from '@bookwell/shared';
import {
  type RefreshTokenRepository,
  type TransactionRunner,
  type VerificationCodeRepository,
} from '@bookwell/domain';

export interface AuthCleanupDeps {
  withTransaction: TransactionRunner;
  refreshTokenRepo: Pick<RefreshTokenRepository, 'deleteExpired'>;
  verificationCodeRepo: Pick<VerificationCodeRepository, 'deleteExpired'>;
  /** Refresh tokens are kept this long past expiry or revocation for reuse forensics; codes go once expired or used. */
  retentionDays: number;
  logger: SafeLogger;
}

export interface AuthCleanupResult {
  deletedTokens: number;
  deletedCodes: number;
}

export async function runAuthCleanupJob(deps: AuthCleanupDeps): Promise<AuthCleanupResult> {
  const { logger } = deps;
  logger.info({}, 'Auth cleanup started');

  const deletedTokens = await deps.withTransaction((tx) =>
    deps.refreshTokenRepo.deleteExpired(tx, deps.retentionDays),
  );
  if (deletedTokens > 0) {
    logger.info({ count: deletedTokens }, 'Cleaned up expired refresh tokens');
  }

  const deletedCodes = await deps.withTransaction((tx) => deps.verificationCodeRepo.deleteExpired(tx));
  if (deletedCodes > 0) {
    logger.info({ count: deletedCodes }, 'Cleaned up expired verification codes');
  }

  logger.info({}, 'Auth cleanup completed');
  return { deletedTokens, deletedCodes };
}
