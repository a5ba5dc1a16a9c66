import {
  type User,
  type NewUser,
  type UserPatch,
  type UserRole,
  type RefreshToken,
  type NewRefreshToken,
  type VerificationCode,
  type NewVerificationCode,
} from './user';

export type IsolationLevel = 'read committed' | 'serializable';

export interface TransactionOptions {
  isolation?: IsolationLevel;
  signal?: AbortSignal;
}

export type TransactionRunner = <T>(
  fn: (tx: unknown) => Promise<T>,
  options?: TransactionOptions,
) => Promise<T>;

/** Carried from the enclosing request; aborting it rolls back the open transaction. */
export interface RequestContext {
  signal?: AbortSignal;
}

export interface LoggerPort {
  info(meta: Record<string, unknown>, msg: string): void;
  warn(meta: Record<string, unknown>, msg: string): void;
  error(meta: Record<string, unknown>, msg: string): void;
}

export interface UserRepository {
  /** Throws AuthError('DUPLICATE_EMAIL') when the unique email index rejects the row. */
  create(tx: unknown, user: NewUser): Promise<User>;
  findByEmail(tx: unknown, email: string): Promise<User | null>;
  /** Row-locks the account until the transaction ends; serializes per-address verification work. */
  lockByEmail(tx: unknown, email: string): Promise<User | null>;
  findById(tx: unknown, id: string): Promise<User | null>;
  existsByEmail(tx: unknown, email: string): Promise<boolean>;
  update(tx: unknown, id: string, patch: UserPatch): Promise<void>;
}

export interface RefreshTokenRepository {
  create(tx: unknown, token: NewRefreshToken): Promise<RefreshToken>;
  findByTokenHash(tx: unknown, tokenHash: string): Promise<RefreshToken | null>;
  /** Same lookup, holding a row lock until the transaction ends. */
  lockByTokenHash(tx: unknown, tokenHash: string): Promise<RefreshToken | null>;
  hasReuseInFamily(tx: unknown, familyId: string): Promise<boolean>;
  markRotated(tx: unknown, id: string, at: Date): Promise<void>;
  markReuseDetected(tx: unknown, id: string, at: Date): Promise<void>;
  revoke(tx: unknown, id: string, at: Date): Promise<boolean>;
  revokeFamily(tx: unknown, familyId: string, at: Date): Promise<number>;
  revokeAllForUser(tx: unknown, userId: string, at: Date): Promise<number>;
  pruneForUser(tx: unknown, userId: string, keep: number): Promise<number>;
  deleteExpired(tx: unknown, retentionDays: number): Promise<number>;
}

export interface VerificationCodeRepository {
  create(tx: unknown, code: NewVerificationCode): Promise<VerificationCode>;
  findLatestByEmail(tx: unknown, email: string): Promise<VerificationCode | null>;
  supersedeOutstanding(tx: unknown, email: string, at: Date): Promise<number>;
  /** Conditional on the code still being unused; false means another caller consumed it. */
  markUsed(tx: unknown, id: string, at: Date): Promise<boolean>;
  incrementAttempts(tx: unknown, id: string): Promise<number>;
  deleteExpired(tx: unknown): Promise<number>;
}

export interface PasswordHasher {
  hash(password: string): Promise<string>;
  verify(password: string, hash: string): Promise<boolean>;
  /** True when a stored hash was made with weaker parameters than the current ones. */
  needsRehash(hash: string): boolean;
}

/** Hashes opaque secrets (refresh tokens, verification codes) with a server-side pepper. */
export interface SecretHasher {
  generate(): string;
  hash(raw: string): string;
  matches(raw: string, hash: string): boolean;
}

export interface AccessTokenClaims {
  userId: string;
  role: UserRole;
}

export interface TokenService {
  signAccessToken(userId: string, role: UserRole): Promise<string>;
  verifyAccessToken(token: string): Promise<AccessTokenClaims>;
}

export interface Mailer {
  sendVerificationCode(email: string, code: string): Promise<void>;
}
