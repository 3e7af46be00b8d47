import {
  CanActivate,
  ExecutionContext,
  Injectable,
  Logger,
  UnauthorizedException,
} from '@nestjs/common';
import {
  ClerkTokenVerifier,
  extractBearerToken,
  type AuthenticatedRequest,
} from '../clerk-token.verifier';

@Injectable()
export class ClerkAuthGuard implements CanActivate {
  private readonly logger = new Logger(ClerkAuthGuard.name);

  constructor(private readonly verifier: ClerkTokenVerifier) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const token = extractBearerToken(request.headers['authorization']);

    if (!token) {
      this.logger.warn('Request missing Authorization Bearer token');
      throw new UnauthorizedException(
        'Missing or invalid authorization header',
      );
    }

    request.actorId = await this.verifier.verify(token);
    return true;
  }
}
