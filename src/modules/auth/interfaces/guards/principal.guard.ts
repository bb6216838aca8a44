import { CanActivate, ExecutionContext, Inject, Injectable } from '@nestjs/common';
import type { RequestWithPrincipal } from '../../domain/principal';
import {
  IPrincipalResolverToken,
  type IPrincipalResolver,
} from '../../domain/principal-resolver.interface';

/**
 * Attaches the caller's principal (or `null`) to the request. Never rejects:
 * whether an anonymous caller may proceed is decided by the gallery policy.
 */
@Injectable()
export class PrincipalGuard implements CanActivate {
  constructor(
    @Inject(IPrincipalResolverToken)
    private readonly resolver: IPrincipalResolver,
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<RequestWithPrincipal>();
    const header = request.headers.authorization;
    const authorization = Array.isArray(header) ? header[0] : header;

    request.principal = await this.resolver.resolve(authorization);
    return true;
  }
}
