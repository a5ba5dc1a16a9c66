import { type FastifyInstance } from 'fastify';
import { AppError, ErrorCode, errorMessage, type SafeLogger } from '@bookwell/shared';
import { AuthError, type AuthErrorKind } from '@bookwell/domain';

const AUTH_ERROR_CODES: Record<AuthErrorKind, ErrorCode> = {
  INVALID_CREDENTIALS: ErrorCode.UNAUTHORIZED,
  INVALID_REFRESH_TOKEN: ErrorCode.UNAUTHORIZED,
  REFRESH_TOKEN_REUSED: ErrorCode.UNAUTHORIZED,
  ACCOUNT_LOCKED: ErrorCode.LOCKED,
  ACCOUNT_BANNED: ErrorCode.FORBIDDEN,
  EMAIL_NOT_VERIFIED: ErrorCode.FORBIDDEN,
  DUPLICATE_EMAIL: ErrorCode.CONFLICT,
  CODE_INVALID: ErrorCode.VALIDATION,
  TOO_MANY_ATTEMPTS: ErrorCode.RATE_LIMITED,
  RESEND_TOO_SOON: ErrorCode.RATE_LIMITED,
  INTERNAL: ErrorCode.INTERNAL,
};

/** `reason` carries the auth kind so clients can tell the 401s apart. */
export function authErrorToAppError(err: AuthError): AppError {
  if (err.kind === 'INTERNAL') {
    return new AppError(ErrorCode.INTERNAL, 'Internal server error');
  }
  return new AppError(AUTH_ERROR_CODES[err.kind], err.message, { reason: err.kind, ...err.safeMeta });
}

export function registerErrorHandler(app: FastifyInstance, logger: SafeLogger): void {
  app.setErrorHandler((error, request, reply) => {
    const appError = error instanceof AuthError ? authErrorToAppError(error) : error;

    if (error instanceof AuthError && error.kind === 'INTERNAL') {
      logger.error(
        { requestId: request.id, err: errorMessage(error.cause) },
        'Auth operation failed',
      );
    }

    if (appError instanceof AppError) {
      if (appError.code !== ErrorCode.INTERNAL) {
        logger.warn({ requestId: request.id, errorCode: appError.code, ...appError.safeMeta }, appError.message);
      }
      if (appError.retryAfterSeconds !== null) {
        reply.header('retry-after', String(appError.retryAfterSeconds));
      }
      return reply.status(appError.httpStatus).send(appError.toJSON());
    }

    // Fastify's own 4xx errors: malformed JSON, oversized bodies, bad content type.
    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      return reply.status(error.statusCode).send({
        code: ErrorCode.BAD_REQUEST,
        message: error.message,
      });
    }

    logger.error({ requestId: request.id, err: error.message }, 'Unhandled error');

    return reply.status(500).send({
      code: ErrorCode.INTERNAL,
      message: 'Internal server error',
    });
  });
}
