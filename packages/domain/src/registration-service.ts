import { normalizeEmail, toPublicUser } from './auth';
import { AuthError, toAuthError } from './errors';
import {
  type LoggerPort,
  type PasswordHasher,
  type RequestContext,
  type TransactionRunner,
  type UserRepository,
} from './ports';
import { type PublicUser } from './user';
import { type VerificationGate } from './verification-gate';

export interface RegistrationServiceDeps {
  userRepo: UserRepository;
  passwordHasher: PasswordHasher;
  verificationGate: Pick<VerificationGate, 'requestCode'>;
  logger: LoggerPort;
  generateId: () => string;
  withTransaction: TransactionRunner;
}

export interface RegisterInput {
  email: string;
  password: string;
  name: string;
  phone?: string | null;
  role: 'client' | 'studio_owner';
}

export interface RegistrationResult {
  user: PublicUser;
  /** Null when the first code could not be sent; the user can request another. */
  verificationIssuedAt: Date | null;
}

export class RegistrationService {
  constructor(private readonly deps: RegistrationServiceDeps) {}

  async register(input: RegisterInput, ctx: RequestContext = {}): Promise<RegistrationResult> {
    const { userRepo, passwordHasher, generateId } = this.deps;
    const email = normalizeEmail(input.email);

    try {
      const exists = await this.deps.withTransaction(
        (tx) => userRepo.existsByEmail(tx, email),
        { signal: ctx.signal },
      );
      if (exists) {
        throw new AuthError('DUPLICATE_EMAIL', 'Email is already registered');
      }

      const passwordHash = await passwordHasher.hash(input.password);

      // The existence check above is optimistic; a concurrent registration
      // surfaces here as DUPLICATE_EMAIL from the unique index.
      const user = await this.deps.withTransaction(
        (tx) =>
          userRepo.create(tx, {
            id: generateId(),
            email,
            passwordHash,
            name: input.name,
            phone: input.phone ?? null,
            role: input.role,
            studioStatus: input.role === 'studio_owner' ? 'pending' : null,
          }),
        { signal: ctx.signal },
      );

      this.deps.logger.info({ userId: user.id, role: user.role }, 'User registered');

      return {
        user: toPublicUser(user),
        verificationIssuedAt: await this.sendFirstCode(user.id, email, ctx),
      };
    } catch (err) {
      throw toAuthError(err);
    }
  }

  async getCurrentUser(userId: string, ctx: RequestContext = {}): Promise<PublicUser | null> {
    try {
      const user = await this.deps.withTransaction(
        (tx) => this.deps.userRepo.findById(tx, userId),
        { signal: ctx.signal },
      );
      return user ? toPublicUser(user) : null;
    } catch (err) {
      throw toAuthError(err);
    }
  }

  private async sendFirstCode(userId: string, email: string, ctx: RequestContext): Promise<Date | null> {
    try {
      const { issuedAt } = await this.deps.verificationGate.requestCode(email, ctx);
      return issuedAt;
    } catch (err) {
      this.deps.logger.warn(
        { userId, err: err instanceof Error ? err.message : String(err) },
        'Initial verification code could not be sent',
      );
      return null;
    }
  }
}
