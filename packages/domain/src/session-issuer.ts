import { isAccountBlocked, isEmailVerified, normalizeEmail, toPublicUser } from './auth';
import { AuthError, accountLocked, reject, succeed, toAuthError, unwrap, type Outcome } from './errors';
import { isLocked, registerFailure, registerSuccess } from './lockout';
import { type AuthPolicy } from './policy';
import {
  type LoggerPort,
  type PasswordHasher,
  type RefreshTokenRepository,
  type RequestContext,
  type SecretHasher,
  type TokenService,
  type TransactionRunner,
  type UserRepository,
} from './ports';
import { type PublicUser, type User, type UserPatch } from './user';

export interface SessionIssuerDeps {
  userRepo: UserRepository;
  refreshTokenRepo: RefreshTokenRepository;
  passwordHasher: PasswordHasher;
  tokenService: TokenService;
  refreshTokenHasher: SecretHasher;
  logger: LoggerPort;
  generateId: () => string;
  withTransaction: TransactionRunner;
  now: () => Date;
  policy: AuthPolicy;
}

export interface LoginInput {
  email: string;
  password: string;
  userAgent?: string | null;
  ip?: string | null;
}

export interface SessionResult {
  user: PublicUser;
  accessToken: string;
  /** Raw secret; only its peppered hash is stored, so this is the one chance to read it. */
  refreshToken: string;
  expiresIn: number;
}

export class SessionIssuer {
  constructor(private readonly deps: SessionIssuerDeps) {}

  async login(input: LoginInput, ctx: RequestContext = {}): Promise<SessionResult> {
    try {
      const outcome = await this.deps.withTransaction(
        (tx) => this.authenticate(tx, input),
        { signal: ctx.signal },
      );
      const session = unwrap(outcome);
      await this.pruneSessions(session.user.id);
      return session;
    } catch (err) {
      throw toAuthError(err);
    }
  }

  /**
   * Order matters: the ban and lock checks run before the password hash is
   * touched, so a locked account does no hashing work and its window is not
   * reset. Failed attempts are returned as outcomes rather than thrown so the
   * counter update commits.
   */
  private async authenticate(tx: unknown, input: LoginInput): Promise<Outcome<SessionResult>> {
    const { userRepo, passwordHasher, logger, policy } = this.deps;
    const invalid = () => reject<SessionResult>(new AuthError('INVALID_CREDENTIALS', 'Invalid credentials'));

    const user = await userRepo.findByEmail(tx, normalizeEmail(input.email));
    if (!user) return invalid();

    if (isAccountBlocked(user)) {
      return reject(new AuthError('ACCOUNT_BANNED', 'Account is banned'));
    }

    const now = this.deps.now();
    if (isLocked(user, now)) {
      return reject(accountLocked(user.lockedUntil));
    }

    const verified = isEmailVerified(user);

    const valid = await passwordHasher.verify(input.password, user.passwordHash);
    if (!valid) {
      const next = registerFailure(user, now, policy.lockout);
      await userRepo.update(tx, user.id, next);
      if (isLocked(next, now)) {
        logger.warn({ userId: user.id, attempts: next.failedLoginAttempts }, 'Account locked after failed logins');
        return reject(accountLocked(next.lockedUntil));
      }
      return invalid();
    }

    // A proven password clears the counter even when the login is then refused
    // for verification; the outcome commits this write either way.
    const patch: UserPatch = registerSuccess(user) ?? {};
    if (passwordHasher.needsRehash(user.passwordHash)) {
      patch.passwordHash = await passwordHasher.hash(input.password);
    }
    if (Object.keys(patch).length > 0) {
      await userRepo.update(tx, user.id, patch);
    }

    if (!verified) {
      return reject(new AuthError('EMAIL_NOT_VERIFIED', 'Email address is not verified'));
    }

    const session = await this.openFamily(tx, { ...user, ...patch }, input, now);
    logger.info({ userId: user.id }, 'Login succeeded');
    return succeed(session);
  }

  private async openFamily(tx: unknown, user: User, input: LoginInput, now: Date): Promise<SessionResult> {
    const { refreshTokenRepo, tokenService, refreshTokenHasher, generateId, policy } = this.deps;

    const accessToken = await tokenService.signAccessToken(user.id, user.role);
    const refreshToken = refreshTokenHasher.generate();

    await refreshTokenRepo.create(tx, {
      id: generateId(),
      userId: user.id,
      tokenHash: refreshTokenHasher.hash(refreshToken),
      familyId: generateId(),
      rotatedFrom: null,
      issuedAt: now,
      expiresAt: new Date(now.getTime() + policy.refreshTokenTtlMs),
      userAgent: input.userAgent ?? null,
      ip: input.ip ?? null,
    });

    return {
      user: toPublicUser(user),
      accessToken,
      refreshToken,
      expiresIn: policy.accessTokenTtlSeconds,
    };
  }

  private async pruneSessions(userId: string): Promise<void> {
    const { refreshTokenRepo, logger, policy } = this.deps;
    try {
      const pruned = await this.deps.withTransaction((tx) =>
        refreshTokenRepo.pruneForUser(tx, userId, policy.refreshTokensPerUser),
      );
      if (pruned > 0) {
        logger.info({ userId, count: pruned }, 'Pruned old refresh tokens');
      }
    } catch (err) {
      logger.warn(
        { userId, err: err instanceof Error ? err.message : String(err) },
        'Refresh token pruning failed',
      );
    }
  }
}
