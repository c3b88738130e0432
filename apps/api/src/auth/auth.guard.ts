import {
  CanActivate,
  ExecutionContext,
  Inject,
  Injectable,
  NotFoundException,
  UnauthorizedException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Reflector } from '@nestjs/core';
import { createHmac, timingSafeEqual } from 'crypto';
import { createRemoteJWKSet, jwtVerify } from 'jose';
import { USER_DIRECTORY, type UserDirectory } from '../users/user-directory';
import type { DirectoryUser } from '../users/user.types';
import { IS_PUBLIC_KEY } from './public.decorator';
import { AuthRequest } from './current-user.decorator';

type JwtClaims = {
  sub?: string;
  iss?: string;
  aud?: string | string[];
  exp?: number;
  nbf?: number;
  iat?: number;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toClaims(raw: Record<string, unknown>): JwtClaims {
  const optionalString = (value: unknown) =>
    typeof value === 'string' ? value : undefined;
  const optionalNumber = (value: unknown) =>
    typeof value === 'number' ? value : undefined;

  return {
    sub: optionalString(raw.sub),
    iss: optionalString(raw.iss),
    aud: Array.isArray(raw.aud)
      ? raw.aud.filter((value): value is string => typeof value === 'string')
      : optionalString(raw.aud),
    exp: optionalNumber(raw.exp),
    nbf: optionalNumber(raw.nbf),
    iat: optionalNumber(raw.iat),
  };
}

@Injectable()
export class AuthGuard implements CanActivate {
  private jwks: ReturnType<typeof createRemoteJWKSet> | null = null;
  private jwksUri: string | null = null;

  constructor(
    @Inject(USER_DIRECTORY) private readonly directory: UserDirectory,
    private readonly reflector: Reflector,
    private readonly config: ConfigService,
  ) {}

  async canActivate(context: ExecutionContext) {
    const isPublic = this.reflector.getAllAndOverride<boolean>(IS_PUBLIC_KEY, [
      context.getHandler(),
      context.getClass(),
    ]);

    if (isPublic) {
      return true;
    }

    const request = context.switchToHttp().getRequest<AuthRequest>();
    const token = this.extractBearerToken(request.headers.authorization);
    const userId = token
      ? await this.subjectFromBearerToken(token)
      : this.subjectFromInsecureHeader(request.headers['x-user-id']);

    if (!userId) {
      throw new UnauthorizedException('Missing authentication credentials');
    }

    const user = await this.findUser(userId);
    if (!user) {
      throw new UnauthorizedException('Unknown user');
    }

    request.user = {
      id: user.id,
      email: user.email,
      displayName: user.displayName,
      role: user.role,
    };

    return true;
  }

  private async findUser(userId: string): Promise<DirectoryUser | null> {
    try {
      return await this.directory.resolve(userId);
    } catch (error) {
      if (error instanceof NotFoundException) {
        return null;
      }
      throw error;
    }
  }

  private subjectFromInsecureHeader(
    userIdHeader: string | string[] | undefined,
  ): string | null {
    if (this.config.get<string>('AUTH_ALLOW_INSECURE_HEADERS') !== 'true') {
      throw new UnauthorizedException('Bearer token is required');
    }
    return this.singleHeaderValue(userIdHeader);
  }

  private async subjectFromBearerToken(token: string): Promise<string> {
    const algorithm = this.getTokenAlgorithm(token);
    const claims =
      algorithm === 'HS256'
        ? this.verifyHs256Jwt(token)
        : await this.verifyJwksJwt(token);

    if (typeof claims.sub !== 'string' || !claims.sub.trim()) {
      throw new UnauthorizedException('Token must include a sub claim');
    }
    return claims.sub;
  }

  private async verifyJwksJwt(token: string): Promise<JwtClaims> {
    const jwksUri = this.config.get<string>('AUTH_JWKS_URI');
    if (!jwksUri) {
      throw new UnauthorizedException('Unsupported token algorithm');
    }

    try {
      const { payload } = await jwtVerify(token, this.getJwks(jwksUri), {
        issuer: this.config.get<string>('AUTH_JWT_ISSUER'),
        audience: this.config.get<string>('AUTH_JWT_AUDIENCE'),
        algorithms: ['RS256'],
      });
      return payload;
    } catch {
      throw new UnauthorizedException('Invalid bearer token');
    }
  }

  private getJwks(jwksUri: string) {
    if (this.jwks && this.jwksUri === jwksUri) {
      return this.jwks;
    }
    try {
      this.jwks = createRemoteJWKSet(new URL(jwksUri));
      this.jwksUri = jwksUri;
      return this.jwks;
    } catch {
      throw new UnauthorizedException('Invalid JWKS configuration');
    }
  }

  private verifyHs256Jwt(token: string): JwtClaims {
    const secret = this.config.get<string>('AUTH_JWT_SECRET');
    if (!secret) {
      throw new UnauthorizedException('HS256 auth is not configured');
    }

    const parts = token.split('.');
    if (parts.length !== 3) {
      throw new UnauthorizedException('Invalid bearer token');
    }

    const [headerPart, payloadPart, signaturePart] = parts;
    const expectedSignature = createHmac('sha256', secret)
      .update(`${headerPart}.${payloadPart}`)
      .digest();
    const receivedSignature = Buffer.from(signaturePart, 'base64url');

    if (
      expectedSignature.length !== receivedSignature.length ||
      !timingSafeEqual(expectedSignature, receivedSignature)
    ) {
      throw new UnauthorizedException('Invalid token signature');
    }

    const claims = toClaims(this.parseJwtPart(payloadPart, 'payload'));
    this.validateRegisteredClaims(claims);
    return claims;
  }

  private validateRegisteredClaims(claims: JwtClaims) {
    const now = Math.floor(Date.now() / 1000);

    if (typeof claims.exp === 'number' && now >= claims.exp) {
      throw new UnauthorizedException('Token expired');
    }
    if (typeof claims.nbf === 'number' && now < claims.nbf) {
      throw new UnauthorizedException('Token is not active yet');
    }

    const requiredIssuer = this.config.get<string>('AUTH_JWT_ISSUER');
    if (requiredIssuer && claims.iss !== requiredIssuer) {
      throw new UnauthorizedException('Invalid token issuer');
    }

    const requiredAudience = this.config.get<string>('AUTH_JWT_AUDIENCE');
    if (requiredAudience) {
      const audiences = Array.isArray(claims.aud)
        ? claims.aud
        : claims.aud
          ? [claims.aud]
          : [];
      if (!audiences.includes(requiredAudience)) {
        throw new UnauthorizedException('Invalid token audience');
      }
    }
  }

  private parseJwtPart(
    part: string,
    section: string,
  ): Record<string, unknown> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(Buffer.from(part, 'base64url').toString('utf8'));
    } catch {
      throw new UnauthorizedException(`Invalid token ${section}`);
    }
    if (!isRecord(parsed)) {
      throw new UnauthorizedException(`Invalid token ${section}`);
    }
    return parsed;
  }

  private getTokenAlgorithm(token: string): string | null {
    const [headerPart] = token.split('.', 1);
    if (!headerPart) {
      throw new UnauthorizedException('Invalid bearer token');
    }
    const header = this.parseJwtPart(headerPart, 'header');
    return typeof header.alg === 'string' ? header.alg : null;
  }

  private extractBearerToken(
    authorization: string | string[] | undefined,
  ): string | null {
    const header = this.singleHeaderValue(authorization);
    if (!header) return null;

    const [scheme, token] = header.trim().split(/\s+/, 2);
    if (scheme?.toLowerCase() !== 'bearer' || !token) {
      return null;
    }
    return token;
  }

  private singleHeaderValue(
    value: string | string[] | undefined,
  ): string | null {
    if (typeof value === 'string') return value;
    if (Array.isArray(value) && value.length > 0) return value[0] ?? null;
    return null;
  }
}
