import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtService } from '@nestjs/jwt';
import type { Principal } from '../domain/principal';
import type { IPrincipalResolver } from '../domain/principal-resolver.interface';

type TokenClaims = {
  sub?: unknown;
  role?: unknown;
};

const BEARER_PREFIX = /^Bearer\s+/i;

const readRoles = (role: unknown): string[] => {
  const roles = Array.isArray(role) ? role : role ? [role] : [];
  return roles
    .filter((value): value is string => typeof value === 'string')
    .map((value) => value.toLowerCase());
};

@Injectable()
export class JwtPrincipalResolver implements IPrincipalResolver {
  private readonly logger = new Logger(JwtPrincipalResolver.name);
  private readonly staffRoles: Set<string>;

  constructor(
    private readonly jwtService: JwtService,
    configService: ConfigService,
  ) {
    this.staffRoles = new Set(
      configService.get<string[]>('auth.staffRoles') ?? ['admin', 'builder'],
    );
  }

  async resolve(authorization: string | undefined): Promise<Principal | null> {
    if (!authorization || !BEARER_PREFIX.test(authorization)) {
      return null;
    }

    const token = authorization.replace(BEARER_PREFIX, '').trim();
    let claims: TokenClaims;
    try {
      claims = await this.jwtService.verifyAsync<TokenClaims>(token);
    } catch (error) {
      this.logger.debug(
        `Rejected bearer token: ${error instanceof Error ? error.message : String(error)}`,
      );
      return null;
    }

    if (typeof claims.sub !== 'string' || !claims.sub) {
      return null;
    }

    const isStaff = readRoles(claims.role).some((role) => this.staffRoles.has(role));
    return { id: claims.sub, role: isStaff ? 'staff' : 'regular' };
  }
}
