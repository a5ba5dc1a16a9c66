import { z } from 'zod';
import { type AuthPolicy } from '@bookwell/domain';

export const DEV_REFRESH_TOKEN_PEPPER = 'dev-refresh-token-pepper';
export const DEV_VERIFICATION_CODE_PEPPER = 'dev-verification-code-pepper';

const booleanString = z
  .enum(['true', 'false'])
  .default('false')
  .transform((value) => value === 'true');

export const BaseConfigSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  NODE_ID: z.coerce.number().int().min(0).max(1023).default(0),
});

export type BaseConfig = z.infer<typeof BaseConfigSchema>;

export const DatabaseConfigSchema = z.object({
  DATABASE_URL: z.string().min(1),
});

const JwtKeySchema = z.object({
  kid: z.string().min(1),
  secret: z.string().min(32),
});

export const JwtConfigSchema = z.object({
  JWT_ACTIVE_KID: z.string().min(1),
  JWT_KEYS: z
    .string()
    .transform((raw, ctx) => {
      try {
        const parsed: unknown = JSON.parse(raw);
        return parsed;
      } catch {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'JWT_KEYS must be a JSON array' });
        return z.NEVER;
      }
    })
    .pipe(z.array(JwtKeySchema).min(1)),
  JWT_ACCESS_TOKEN_TTL: z.coerce.number().int().positive().default(900),
  JWT_ISSUER: z.string().default('bookwell'),
});

export const AuthConfigSchema = JwtConfigSchema.extend({
  REFRESH_TOKEN_TTL_HOURS: z.coerce.number().int().positive().default(168),
  REFRESH_TOKEN_PEPPER: z.string().min(16).default(DEV_REFRESH_TOKEN_PEPPER),
  REFRESH_TOKENS_PER_USER: z.coerce.number().int().positive().default(10),
  VERIFICATION_CODE_PEPPER: z.string().min(16).default(DEV_VERIFICATION_CODE_PEPPER),
  VERIFY_CODE_TTL_SECONDS: z.coerce.number().int().positive().default(300),
  VERIFY_RESEND_COOLDOWN_SECONDS: z.coerce.number().int().min(0).default(60),
  VERIFY_MAX_ATTEMPTS: z.coerce.number().int().positive().default(5),
  LOGIN_MAX_FAILED_ATTEMPTS: z.coerce.number().int().positive().default(5),
  LOGIN_LOCKOUT_MINUTES: z.coerce.number().int().positive().default(15),
  PASSWORD_HASH_MEMORY_KIB: z.coerce.number().int().min(8192).default(19456),
  PASSWORD_HASH_TIME_COST: z.coerce.number().int().min(1).default(2),
});

export type AuthConfig = z.infer<typeof AuthConfigSchema>;

export const MailConfigSchema = z.object({
  MAILER: z.enum(['console', 'smtp']).default('console'),
  MAILER_LOG_CODES: booleanString,
  MAIL_FROM: z.string().default('Bookwell <no-reply@bookwell.local>'),
  SMTP_HOST: z.string().optional(),
  SMTP_PORT: z.coerce.number().int().positive().default(587),
  SMTP_SECURE: booleanString,
  SMTP_USER: z.string().optional(),
  SMTP_PASSWORD: z.string().optional(),
});

export type MailConfig = z.infer<typeof MailConfigSchema>;

interface CrossFieldConfig {
  NODE_ENV: BaseConfig['NODE_ENV'];
  JWT_ACTIVE_KID: string;
  JWT_KEYS: Array<{ kid: string }>;
  REFRESH_TOKEN_PEPPER: string;
  VERIFICATION_CODE_PEPPER: string;
  MAILER?: MailConfig['MAILER'];
  SMTP_HOST?: string;
}

function refineAuthConfig(config: CrossFieldConfig, ctx: z.RefinementCtx): void {
  if (!config.JWT_KEYS.some((key) => key.kid === config.JWT_ACTIVE_KID)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['JWT_ACTIVE_KID'],
      message: `no key with kid '${config.JWT_ACTIVE_KID}' in JWT_KEYS`,
    });
  }
  if (config.NODE_ENV === 'production') {
    if (config.REFRESH_TOKEN_PEPPER === DEV_REFRESH_TOKEN_PEPPER) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['REFRESH_TOKEN_PEPPER'],
        message: 'must be set in production',
      });
    }
    if (config.VERIFICATION_CODE_PEPPER === DEV_VERIFICATION_CODE_PEPPER) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['VERIFICATION_CODE_PEPPER'],
        message: 'must be set in production',
      });
    }
  }
  if (config.MAILER === 'smtp' && !config.SMTP_HOST) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['SMTP_HOST'],
      message: 'required when MAILER is smtp',
    });
  }
}

export const ApiConfigSchema = BaseConfigSchema.merge(DatabaseConfigSchema)
  .merge(AuthConfigSchema)
  .merge(MailConfigSchema)
  .extend({
    API_HOST: z.string().default('0.0.0.0'),
    API_PORT: z.coerce.number().default(3000),
    REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
    AUTH_RATE_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(20),
  })
  .superRefine(refineAuthConfig);

export type ApiConfig = z.infer<typeof ApiConfigSchema>;

export const WorkerConfigSchema = BaseConfigSchema.merge(DatabaseConfigSchema).extend({
  AUTH_CLEANUP_INTERVAL_MS: z.coerce.number().int().positive().default(60 * 60 * 1000),
  REVOKED_TOKEN_RETENTION_DAYS: z.coerce.number().int().positive().default(30),
  WORKER_HEALTHCHECK_PATH: z.string().default('/tmp/.worker-healthy'),
});

export type WorkerConfig = z.infer<typeof WorkerConfigSchema>;

export function loadConfig<T extends z.ZodType>(
  schema: T,
  env: Record<string, string | undefined> = process.env,
): z.infer<T> {
  const result = schema.safeParse(env);
  if (!result.success) {
    const formatted = result.error.issues
      .map((issue) => `  ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Config validation failed:\n${formatted}`);
  }
  return result.data;
}

export function authPolicyFromConfig(config: AuthConfig): AuthPolicy {
  return {
    lockout: {
      maxFailedAttempts: config.LOGIN_MAX_FAILED_ATTEMPTS,
      lockoutDurationMs: config.LOGIN_LOCKOUT_MINUTES * 60 * 1000,
    },
    accessTokenTtlSeconds: config.JWT_ACCESS_TOKEN_TTL,
    refreshTokenTtlMs: config.REFRESH_TOKEN_TTL_HOURS * 60 * 60 * 1000,
    refreshTokensPerUser: config.REFRESH_TOKENS_PER_USER,
    verificationCodeTtlMs: config.VERIFY_CODE_TTL_SECONDS * 1000,
    verificationResendCooldownMs: config.VERIFY_RESEND_COOLDOWN_SECONDS * 1000,
    maxVerificationAttempts: config.VERIFY_MAX_ATTEMPTS,
  };
}
