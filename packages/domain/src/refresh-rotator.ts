import { isAccountBlocked, isEmailVerified, isTokenExpired } from './auth';
import { AuthError, reject, succeed, toAuthError, unwrap, type Outcome } from './errors';
import { type AuthPolicy } from './policy';
import {
  type LoggerPort,
  type RefreshTokenRepository,
  type RequestContext,
  type SecretHasher,
  type TokenService,
  type TransactionRunner,
  type UserRepository,
} from './ports';

export interface RefreshRotatorDeps {
  userRepo: UserRepository;
  refreshTokenRepo: RefreshTokenRepository;
  tokenService: TokenService;
  refreshTokenHasher: SecretHasher;
  logger: LoggerPort;
  generateId: () => string;
  withTransaction: TransactionRunner;
  now: () => Date;
  policy: AuthPolicy;
}

export interface RefreshInput {
  refreshToken: string;
  userAgent?: string | null;
  ip?: string | null;
}

export interface RefreshResult {
  userId: string;
  accessToken: string;
  refreshToken: string;
  expiresIn: number;
}

export class RefreshRotator {
  constructor(private readonly deps: RefreshRotatorDeps) {}

  /**
   * Exchanges a refresh token for a successor in the same family. Runs
   * serializable with the presented row locked, so two callers racing on one
   * token serialize and the loser sees it as already used.
   */
  async refresh(input: RefreshInput, ctx: RequestContext = {}): Promise<RefreshResult> {
    try {
      const outcome = await this.deps.withTransaction(
        (tx) => this.rotate(tx, input),
        { isolation: 'serializable', signal: ctx.signal },
      );
      return unwrap(outcome);
    } catch (err) {
      throw toAuthError(err);
    }
  }

  /** Absent, expired or already revoked tokens are all a silent success. */
  async logout(refreshToken: string, ctx: RequestContext = {}): Promise<void> {
    const { refreshTokenRepo, refreshTokenHasher, logger } = this.deps;
    try {
      await this.deps.withTransaction(async (tx) => {
        const stored = await refreshTokenRepo.findByTokenHash(tx, refreshTokenHasher.hash(refreshToken));
        if (!stored) return;
        const revoked = await refreshTokenRepo.revoke(tx, stored.id, this.deps.now());
        if (revoked) {
          logger.info({ userId: stored.userId, familyId: stored.familyId }, 'Refresh token revoked on logout');
        }
      }, { signal: ctx.signal });
    } catch (err) {
      throw toAuthError(err);
    }
  }

  /** Entry point for the ban flow owned by administration. */
  async revokeAllForUser(userId: string, ctx: RequestContext = {}): Promise<number> {
    const { refreshTokenRepo, logger } = this.deps;
    try {
      const count = await this.deps.withTransaction(
        (tx) => refreshTokenRepo.revokeAllForUser(tx, userId, this.deps.now()),
        { signal: ctx.signal },
      );
      logger.info({ userId, count }, 'Revoked all refresh tokens for user');
      return count;
    } catch (err) {
      throw toAuthError(err);
    }
  }

  private async rotate(tx: unknown, input: RefreshInput): Promise<Outcome<RefreshResult>> {
    const { userRepo, refreshTokenRepo, tokenService, refreshTokenHasher, logger, generateId, policy } = this.deps;
    const now = this.deps.now();
    const invalid = () => reject<RefreshResult>(new AuthError('INVALID_REFRESH_TOKEN', 'Invalid refresh token'));

    const stored = await refreshTokenRepo.lockByTokenHash(tx, refreshTokenHasher.hash(input.refreshToken));
    if (!stored || isTokenExpired(stored.expiresAt, now)) {
      return invalid();
    }

    if (stored.usedAt !== null || stored.revokedAt !== null) {
      // A family that already tripped the alarm is dead; its members are just invalid.
      if (await refreshTokenRepo.hasReuseInFamily(tx, stored.familyId)) {
        logger.warn({ userId: stored.userId, familyId: stored.familyId }, 'Refresh token from compromised family presented');
        return invalid();
      }

      await refreshTokenRepo.markReuseDetected(tx, stored.id, now);
      const revoked = await refreshTokenRepo.revokeFamily(tx, stored.familyId, now);
      logger.error(
        { userId: stored.userId, familyId: stored.familyId, tokenId: stored.id, revokedCount: revoked },
        'Refresh token reuse detected',
      );
      return reject(new AuthError('REFRESH_TOKEN_REUSED', 'Refresh token reuse detected'));
    }

    const user = await userRepo.findById(tx, stored.userId);
    if (!user) {
      await refreshTokenRepo.revokeFamily(tx, stored.familyId, now);
      return invalid();
    }
    if (isAccountBlocked(user)) {
      await refreshTokenRepo.revokeFamily(tx, stored.familyId, now);
      logger.warn({ userId: user.id, familyId: stored.familyId }, 'Refresh attempted by banned account');
      return reject(new AuthError('ACCOUNT_BANNED', 'Account is banned'));
    }
    if (!isEmailVerified(user)) {
      return reject(new AuthError('EMAIL_NOT_VERIFIED', 'Email address is not verified'));
    }

    await refreshTokenRepo.markRotated(tx, stored.id, now);

    const refreshToken = refreshTokenHasher.generate();
    await refreshTokenRepo.create(tx, {
      id: generateId(),
      userId: user.id,
      tokenHash: refreshTokenHasher.hash(refreshToken),
      familyId: stored.familyId,
      rotatedFrom: stored.id,
      issuedAt: now,
      expiresAt: new Date(now.getTime() + policy.refreshTokenTtlMs),
      userAgent: input.userAgent ?? null,
      ip: input.ip ?? null,
    });

    const accessToken = await tokenService.signAccessToken(user.id, user.role);

    return succeed({
      userId: user.id,
      accessToken,
      refreshToken,
      expiresIn: policy.accessTokenTtlSeconds,
    });
  }
}
