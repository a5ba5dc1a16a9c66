export type {
  User,
  UserRole,
  StudioStatus,
  PublicUser,
  NewUser,
  UserPatch,
  RefreshToken,
  NewRefreshToken,
  VerificationCode,
  NewVerificationCode,
} from './user';
export {
  normalizeEmail,
  isEmailVerified,
  isAccountBlocked,
  isTokenExpired,
  isRefreshTokenActive,
  toPublicUser,
} from './auth';
export {
  AuthError,
  toAuthError,
  accountLocked,
  type AuthErrorKind,
} from './errors';
export {
  DEFAULT_LOCKOUT_POLICY,
  isLocked,
  registerFailure,
  registerSuccess,
  type LockoutPolicy,
  type LockoutState,
} from './lockout';
export { DEFAULT_AUTH_POLICY, type AuthPolicy } from './policy';
export type {
  IsolationLevel,
  TransactionOptions,
  TransactionRunner,
  RequestContext,
  LoggerPort,
  UserRepository,
  RefreshTokenRepository,
  VerificationCodeRepository,
  PasswordHasher,
  SecretHasher,
  AccessTokenClaims,
  TokenService,
  Mailer,
} from './ports';
export {
  VerificationGate,
  type VerificationGateDeps,
  type VerificationRequestResult,
} from './verification-gate';
export {
  SessionIssuer,
  type SessionIssuerDeps,
  type LoginInput,
  type SessionResult,
} from './session-issuer';
export {
  RefreshRotator,
  type RefreshRotatorDeps,
  type RefreshInput,
  type RefreshResult,
} from './refresh-rotator';
export {
  RegistrationService,
  type RegistrationServiceDeps,
  type RegisterInput,
  type RegistrationResult,
} from './registration-service';
