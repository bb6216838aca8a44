import type { Principal } from './principal';

export interface IPrincipalResolver {
  /**
   * Resolves the value of an `Authorization` header. Missing or invalid
   * credentials resolve to `null` rather than throwing.
   */
  resolve(authorization: string | undefined): Promise<Principal | null>;
}

export const IPrincipalResolverToken = Symbol('IPrincipalResolver');
