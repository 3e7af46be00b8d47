import { Injectable, Logger, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { verifyToken } from '@clerk/backend';

export interface AuthenticatedRequest {
  headers: Record<string, string | string[] | undefined>;
  actorId?: string;
}

/** Token from an `Authorization: Bearer <token>` header value. */
export function extractBearerToken(
  header: string | string[] | undefined,
): string | null {
  const value = Array.isArray(header) ? header[0] : header;
  if (!value || !value.startsWith('Bearer ')) return null;
  return value.slice(7).trim() || null;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null;

/**
 * Subject of a verification result. Accepts the payload itself or a
 * `{ data, errors }` wrapper; a wrapper carrying errors throws the first one.
 */
export function subjectOf(result: unknown): string | null {
  if (!isRecord(result)) return null;
  const errors = result['errors'];
  if (Array.isArray(errors) && errors.length > 0) {
    const [first]: unknown[] = errors;
    throw first instanceof Error ? first : new Error(String(first));
  }
  const payload = isRecord(result['data']) ? result['data'] : result;
  const sub = payload['sub'];
  return typeof sub === 'string' && sub ? sub : null;
}

/**
 * Verifies a Clerk session token and returns its subject, which is used as
 * the engine actor.
 */
@Injectable()
export class ClerkTokenVerifier {
  private readonly logger = new Logger(ClerkTokenVerifier.name);

  constructor(private readonly config: ConfigService) {}

  async verify(token: string): Promise<string> {
    const secretKey = this.config.get<string>('clerk.secretKey');
    if (!secretKey) {
      this.logger.error('CLERK_SECRET_KEY is not set in environment');
      throw new UnauthorizedException('Server auth configuration error');
    }

    let subject: string | null;
    try {
      subject = subjectOf(await verifyToken(token, { secretKey }));
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      this.logger.warn(`Token verification failed: ${msg}`);
      throw new UnauthorizedException('Token verification failed');
    }

    if (!subject) {
      this.logger.warn('Token verified but missing sub claim');
      throw new UnauthorizedException('Invalid token payload: no sub claim');
    }
    this.logger.debug(`Authenticated actor=${subject}`);
    return subject;
  }
}
