import { type FastifyInstance, type FastifyRequest } from 'fastify';
import { type z } from 'zod';
import { AppError, ErrorCode } from '@bookwell/shared';
import {
  type PublicUser,
  type RefreshRotator,
  type RegistrationService,
  type RequestContext,
  type SessionIssuer,
  type VerificationGate,
} from '@bookwell/domain';
import {
  LoginRequestSchema,
  LogoutRequestSchema,
  RefreshRequestSchema,
  RegisterRequestSchema,
  VerifyConfirmRequestSchema,
  VerifyRequestSchema,
  type AuthUser,
  type RefreshResponse,
  type RegisterResponse,
  type SessionResponse,
} from '@bookwell/proto';
import { requireUserId, type createAuthMiddleware } from '../plugins/auth';
import { type createRateLimiter } from '../plugins/rate-limit';

export interface AuthRouteDeps {
  registrationService: Pick<RegistrationService, 'register' | 'getCurrentUser'>;
  sessionIssuer: Pick<SessionIssuer, 'login'>;
  refreshRotator: Pick<RefreshRotator, 'refresh' | 'logout'>;
  verificationGate: Pick<VerificationGate, 'requestCode' | 'confirm'>;
  authenticate: ReturnType<typeof createAuthMiddleware>;
  authRateLimit: ReturnType<typeof createRateLimiter>;
  requestTimeoutMs: number;
}

export function toAuthUser(user: PublicUser): AuthUser {
  return {
    id: user.id,
    email: user.email,
    name: user.name,
    phone: user.phone,
    role: user.role,
    studioStatus: user.studioStatus,
    emailVerified: user.emailVerified || user.emailVerifiedAt !== null,
    createdAt: user.createdAt.toISOString(),
  };
}

function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown, message: string): z.infer<T> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new AppError(ErrorCode.VALIDATION, message, {
      issues: parsed.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
    });
  }
  return parsed.data;
}

function clientInfo(request: FastifyRequest): { userAgent: string | null; ip: string | null } {
  return {
    userAgent: request.headers['user-agent']?.slice(0, 512) ?? null,
    ip: request.ip || null,
  };
}

export function registerAuthRoutes(app: FastifyInstance, deps: AuthRouteDeps): void {
  const { registrationService, sessionIssuer, refreshRotator, verificationGate, authenticate, authRateLimit } = deps;

  const context = (): RequestContext => ({ signal: AbortSignal.timeout(deps.requestTimeoutMs) });

  app.post('/auth/register', { preHandler: [authRateLimit] }, async (request, reply) => {
    const body = parseBody(RegisterRequestSchema, request.body, 'Invalid registration data');

    const result = await registrationService.register(body, context());
    const response: RegisterResponse = {
      user: toAuthUser(result.user),
      verificationSentAt: result.verificationIssuedAt?.toISOString() ?? null,
    };
    return reply.status(201).send(response);
  });

  app.post('/auth/login', { preHandler: [authRateLimit] }, async (request, reply) => {
    const body = parseBody(LoginRequestSchema, request.body, 'Invalid login data');

    const session = await sessionIssuer.login({ ...body, ...clientInfo(request) }, context());
    const response: SessionResponse = {
      accessToken: session.accessToken,
      refreshToken: session.refreshToken,
      tokenType: 'Bearer',
      expiresIn: session.expiresIn,
      user: toAuthUser(session.user),
    };
    return reply.status(200).send(response);
  });

  app.post('/auth/refresh', { preHandler: [authRateLimit] }, async (request, reply) => {
    const body = parseBody(RefreshRequestSchema, request.body, 'Invalid refresh request');

    const result = await refreshRotator.refresh(
      { refreshToken: body.refreshToken, ...clientInfo(request) },
      context(),
    );
    const response: RefreshResponse = {
      accessToken: result.accessToken,
      refreshToken: result.refreshToken,
      tokenType: 'Bearer',
      expiresIn: result.expiresIn,
    };
    return reply.status(200).send(response);
  });

  // No access token required: logging out must work after it has expired.
  app.post('/auth/logout', { preHandler: [authRateLimit] }, async (request, reply) => {
    const body = parseBody(LogoutRequestSchema, request.body, 'Invalid logout request');

    await refreshRotator.logout(body.refreshToken, context());
    return reply.status(204).send();
  });

  app.post('/auth/verify/request', { preHandler: [authRateLimit] }, async (request, reply) => {
    const body = parseBody(VerifyRequestSchema, request.body, 'Invalid verification request');

    await verificationGate.requestCode(body.email, context());
    return reply.status(202).send({ status: 'accepted' });
  });

  app.post('/auth/verify/confirm', { preHandler: [authRateLimit] }, async (request, reply) => {
    const body = parseBody(VerifyConfirmRequestSchema, request.body, 'Invalid verification code');

    await verificationGate.confirm(body.email, body.code, context());
    return reply.status(200).send({ emailVerified: true });
  });

  app.get('/auth/me', { preHandler: [authenticate] }, async (request, reply) => {
    const user = await registrationService.getCurrentUser(requireUserId(request), context());
    if (!user) {
      throw new AppError(ErrorCode.NOT_FOUND, 'User not found');
    }
    return reply.status(200).send(toAuthUser(user));
  });
}
