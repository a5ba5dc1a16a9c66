import { type FastifyRequest } from 'fastify';
import { AppError, ErrorCode } from '@bookwell/shared';
import { type TokenService, type UserRole } from '@bookwell/domain';

declare module 'fastify' {
  interface FastifyRequest {
    userId?: string;
    userRole?: UserRole;
  }
}

export function createAuthMiddleware(tokenService: Pick<TokenService, 'verifyAccessToken'>) {
  return async function authenticate(request: FastifyRequest) {
    const header = request.headers.authorization;
    if (!header || !header.startsWith('Bearer ')) {
      throw new AppError(ErrorCode.UNAUTHORIZED, 'Missing or invalid authorization header');
    }

    const token = header.slice(7);
    try {
      const { userId, role } = await tokenService.verifyAccessToken(token);
      request.userId = userId;
      request.userRole = role;
    } catch {
      throw new AppError(ErrorCode.UNAUTHORIZED, 'Invalid or expired access token');
    }
  };
}

/** For handlers behind `authenticate`. */
export function requireUserId(request: FastifyRequest): string {
  if (!request.userId) {
    throw new AppError(ErrorCode.UNAUTHORIZED, 'Authentication required');
  }
  return request.userId;
}
