export { createLogger, errorMessage, sanitize, type SafeLogger } from './logger';
export { AppError, ErrorCode } from './errors';
export {
  loadConfig,
  authPolicyFromConfig,
  type BaseConfig,
  type AuthConfig,
  type MailConfig,
  type ApiConfig,
  type WorkerConfig,
  BaseConfigSchema,
  DatabaseConfigSchema,
  JwtConfigSchema,
  AuthConfigSchema,
  MailConfigSchema,
  ApiConfigSchema,
  WorkerConfigSchema,
  DEV_REFRESH_TOKEN_PEPPER,
  DEV_VERIFICATION_CODE_PEPPER,
} from './config';
export { SnowflakeGenerator, type DecodedId } from './id';
export { touchHealthFile, startHealthBeat, type HealthBeat } from './healthcheck';
export { Argon2PasswordHasher } from './auth/password-hasher';
export { JoseTokenService, type TokenServiceConfig } from './auth/token-service';
export {
  PepperedSecretHasher,
  generateOpaqueToken,
  generateNumericCode,
} from './auth/secret-hasher';
export {
  SmtpMailer,
  ConsoleMailer,
  createMailer,
  verificationMessage,
  type MailMessage,
  type MailTransport,
} from './mailer';
export { InMemoryRateLimiter, type RateLimiter, type RateLimitDecision } from './rate-limiter';
