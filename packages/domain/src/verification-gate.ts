import { isEmailVerified, isTokenExpired, normalizeEmail } from './auth';
import { AuthError, reject, succeed, toAuthError, unwrap, type Outcome } from './errors';
import { type AuthPolicy } from './policy';
import {
  type LoggerPort,
  type Mailer,
  type RequestContext,
  type SecretHasher,
  type TransactionRunner,
  type UserRepository,
  type VerificationCodeRepository,
} from './ports';

export interface VerificationGateDeps {
  userRepo: UserRepository;
  verificationCodeRepo: VerificationCodeRepository;
  codeHasher: SecretHasher;
  mailer: Mailer;
  logger: LoggerPort;
  generateId: () => string;
  withTransaction: TransactionRunner;
  now: () => Date;
  policy: AuthPolicy;
}

export interface VerificationRequestResult {
  issuedAt: Date;
}

export class VerificationGate {
  constructor(private readonly deps: VerificationGateDeps) {}

  /**
   * Issues a fresh code and hands it to the mailer. Unknown and already
   * verified addresses get the same answer as a real issue. The mail is sent
   * inside the transaction: if delivery fails the code is rolled back and the
   * caller may retry without waiting for the cooldown.
   */
  async requestCode(email: string, ctx: RequestContext = {}): Promise<VerificationRequestResult> {
    const { userRepo, verificationCodeRepo, codeHasher, mailer, logger, generateId, policy } = this.deps;
    const normalized = normalizeEmail(email);

    try {
      return await this.deps.withTransaction(async (tx) => {
        // Concurrent requests for one address queue here, so the cooldown
        // check below sees any code a racing request just committed.
        const user = await userRepo.lockByEmail(tx, normalized);
        const now = this.deps.now();

        if (!user) {
          logger.info({}, 'Verification requested for unknown address');
          return { issuedAt: now };
        }
        if (isEmailVerified(user)) {
          logger.info({ userId: user.id }, 'Verification requested for verified account');
          return { issuedAt: now };
        }

        const latest = await verificationCodeRepo.findLatestByEmail(tx, normalized);
        if (
          latest &&
          latest.usedAt === null &&
          now.getTime() < latest.createdAt.getTime() + policy.verificationResendCooldownMs
        ) {
          throw new AuthError('RESEND_TOO_SOON', 'Verification code was sent recently', {
            retryAfterSeconds: Math.ceil(
              (latest.createdAt.getTime() + policy.verificationResendCooldownMs - now.getTime()) / 1000,
            ),
          });
        }

        await verificationCodeRepo.supersedeOutstanding(tx, normalized, now);

        const code = codeHasher.generate();
        await verificationCodeRepo.create(tx, {
          id: generateId(),
          userId: user.id,
          email: normalized,
          codeHash: codeHasher.hash(code),
          expiresAt: new Date(now.getTime() + policy.verificationCodeTtlMs),
          createdAt: now,
        });

        await mailer.sendVerificationCode(user.email, code);
        logger.info({ userId: user.id }, 'Verification code issued');

        return { issuedAt: now };
      }, { signal: ctx.signal });
    } catch (err) {
      throw toAuthError(err);
    }
  }

  async confirm(email: string, code: string, ctx: RequestContext = {}): Promise<void> {
    const normalized = normalizeEmail(email);

    try {
      const outcome = await this.deps.withTransaction(
        (tx) => this.consume(tx, normalized, code),
        { signal: ctx.signal },
      );
      unwrap(outcome);
    } catch (err) {
      throw toAuthError(err);
    }
  }

  private async consume(tx: unknown, email: string, code: string): Promise<Outcome<void>> {
    const { userRepo, verificationCodeRepo, codeHasher, logger, policy } = this.deps;
    const now = this.deps.now();
    const invalid = () => reject<void>(new AuthError('CODE_INVALID', 'Invalid or expired verification code'));

    // Guesses for one address are serialized, so the attempt cap holds under concurrency.
    const user = await userRepo.lockByEmail(tx, email);
    if (!user) return invalid();

    const latest = await verificationCodeRepo.findLatestByEmail(tx, email);
    if (!latest || latest.usedAt !== null || isTokenExpired(latest.expiresAt, now)) {
      return invalid();
    }
    if (latest.attempts >= policy.maxVerificationAttempts) {
      return reject(new AuthError('TOO_MANY_ATTEMPTS', 'Too many verification attempts'));
    }

    if (!codeHasher.matches(code, latest.codeHash)) {
      const attempts = await verificationCodeRepo.incrementAttempts(tx, latest.id);
      if (attempts >= policy.maxVerificationAttempts) {
        logger.warn({ userId: user.id, attempts }, 'Verification code exhausted');
        return reject(new AuthError('TOO_MANY_ATTEMPTS', 'Too many verification attempts'));
      }
      return invalid();
    }

    const claimed = await verificationCodeRepo.markUsed(tx, latest.id, now);
    if (!claimed) return invalid();

    await userRepo.update(tx, user.id, { emailVerified: true, emailVerifiedAt: now });
    logger.info({ userId: user.id }, 'Email verified');
    return succeed(undefined);
  }
}
