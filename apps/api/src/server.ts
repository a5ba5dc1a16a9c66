import Fastify, { type FastifyInstance } from 'fastify';
import {
  Argon2PasswordHasher,
  JoseTokenService,
  PepperedSecretHasher,
  SnowflakeGenerator,
  authPolicyFromConfig,
  createMailer,
  generateNumericCode,
  type ApiConfig,
  type SafeLogger,
} from '@bookwell/shared';
import {
  RefreshRotator,
  RegistrationService,
  SessionIssuer,
  VerificationGate,
  type TokenService,
} from '@bookwell/domain';
import {
  PgRefreshTokenRepository,
  PgUserRepository,
  PgVerificationCodeRepository,
  pingDatabase,
  withTransaction,
} from '@bookwell/db';
import { registerErrorHandler } from './plugins/error-handler';
import { createAuthMiddleware } from './plugins/auth';
import { createRateLimiter, type RateLimitOptions } from './plugins/rate-limit';
import { registerAuthRoutes, type AuthRouteDeps } from './routes/auth';

export interface ServerDeps
  extends Pick<AuthRouteDeps, 'registrationService' | 'sessionIssuer' | 'refreshRotator' | 'verificationGate'> {
  logger: SafeLogger;
  tokenService: Pick<TokenService, 'verifyAccessToken'>;
  checkDatabase: () => Promise<boolean>;
  requestTimeoutMs: number;
  authRateLimit: RateLimitOptions;
}

/** Wires the Postgres-backed services from validated config. */
export function createServerDeps(config: ApiConfig, logger: SafeLogger): ServerDeps {
  const idGen = new SnowflakeGenerator(config.NODE_ID);
  const policy = authPolicyFromConfig(config);
  const tokenService = new JoseTokenService({
    activeKid: config.JWT_ACTIVE_KID,
    keys: config.JWT_KEYS,
    accessTokenTtl: config.JWT_ACCESS_TOKEN_TTL,
    issuer: config.JWT_ISSUER,
  });
  const passwordHasher = new Argon2PasswordHasher({
    memoryCost: config.PASSWORD_HASH_MEMORY_KIB,
    timeCost: config.PASSWORD_HASH_TIME_COST,
  });
  const refreshTokenHasher = new PepperedSecretHasher(config.REFRESH_TOKEN_PEPPER);
  const codeHasher = new PepperedSecretHasher(config.VERIFICATION_CODE_PEPPER, () => generateNumericCode());
  const mailer = createMailer(
    config,
    logger.child({ component: 'mailer' }),
    Math.ceil(config.VERIFY_CODE_TTL_SECONDS / 60),
  );

  const userRepo = new PgUserRepository();
  const refreshTokenRepo = new PgRefreshTokenRepository();
  const shared = {
    generateId: idGen.asFunction(),
    withTransaction,
    now: () => new Date(),
    policy,
  };

  const verificationGate = new VerificationGate({
    ...shared,
    userRepo,
    verificationCodeRepo: new PgVerificationCodeRepository(),
    codeHasher,
    mailer,
    logger: logger.child({ component: 'verification' }),
  });

  return {
    logger,
    tokenService,
    checkDatabase: pingDatabase,
    requestTimeoutMs: config.REQUEST_TIMEOUT_MS,
    authRateLimit: { windowMs: 60_000, maxRequests: config.AUTH_RATE_LIMIT_PER_MINUTE },
    verificationGate,
    registrationService: new RegistrationService({
      userRepo,
      passwordHasher,
      verificationGate,
      logger: logger.child({ component: 'registration' }),
      generateId: shared.generateId,
      withTransaction,
    }),
    sessionIssuer: new SessionIssuer({
      ...shared,
      userRepo,
      refreshTokenRepo,
      passwordHasher,
      tokenService,
      refreshTokenHasher,
      logger: logger.child({ component: 'session' }),
    }),
    refreshRotator: new RefreshRotator({
      ...shared,
      userRepo,
      refreshTokenRepo,
      tokenService,
      refreshTokenHasher,
      logger: logger.child({ component: 'refresh' }),
    }),
  };
}

export async function buildServer(deps: ServerDeps): Promise<FastifyInstance> {
  const { logger } = deps;
  const app = Fastify({
    logger: false,
    bodyLimit: 65_536,
    trustProxy: true,
  });

  registerErrorHandler(app, logger);

  app.addHook('onRequest', (request, _reply, done) => {
    logger.info({ method: request.method, url: request.url, requestId: request.id }, 'Incoming request');
    done();
  });

  app.addHook('onResponse', (request, reply, done) => {
    logger.info(
      { method: request.method, url: request.url, statusCode: reply.statusCode, requestId: request.id },
      'Request completed',
    );
    done();
  });

  app.get('/health', async (_request, reply) => {
    const database = (await deps.checkDatabase()) ? 'up' : 'down';
    return reply.status(database === 'up' ? 200 : 503).send({
      status: database === 'up' ? 'ok' : 'degraded',
      database,
      timestamp: new Date().toISOString(),
    });
  });

  registerAuthRoutes(app, {
    registrationService: deps.registrationService,
    sessionIssuer: deps.sessionIssuer,
    refreshRotator: deps.refreshRotator,
    verificationGate: deps.verificationGate,
    authenticate: createAuthMiddleware(deps.tokenService),
    authRateLimit: createRateLimiter(deps.authRateLimit, logger),
    requestTimeoutMs: deps.requestTimeoutMs,
  });

  return app;
}
