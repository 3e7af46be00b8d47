import {
  createParamDecorator,
  ExecutionContext,
  UnauthorizedException,
} from '@nestjs/common';
import type { AuthenticatedRequest } from '../clerk-token.verifier';

/** Engine actor set by ClerkAuthGuard. */
export const ActorId = createParamDecorator(
  (_: unknown, ctx: ExecutionContext): string => {
    const request = ctx.switchToHttp().getRequest<AuthenticatedRequest>();
    if (!request.actorId) {
      throw new UnauthorizedException('Request is not authenticated');
    }
    return request.actorId;
  },
);
