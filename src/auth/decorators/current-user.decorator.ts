import { createParamDecorator, ExecutionContext, UnauthorizedException } from '@nestjs/common';
import {
  AuthenticatedRequest,
  AuthenticatedUser,
} from '../interfaces/authenticated-request.interface';
import { AUTH_CONSTANTS } from '../constants/auth.constants';

/**
 * The `{ userId, sessionId }` set by AuthGuard. Only valid on guarded routes.
 */
export const CurrentUser = createParamDecorator(
  (_data: unknown, context: ExecutionContext): AuthenticatedUser => {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    if (!request.user) {
      throw new UnauthorizedException(AUTH_CONSTANTS.MESSAGES.INVALID_SESSION);
    }
    return request.user;
  },
);
