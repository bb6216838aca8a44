export type PrincipalRole = 'staff' | 'regular';

/**
 * The authenticated actor behind a request. Anonymous requests carry no
 * principal at all (`null`).
 */
export interface Principal {
  id: string;
  role: PrincipalRole;
}

export type RequestWithPrincipal = {
  headers: Record<string, string | string[] | undefined>;
  principal?: Principal | null;
};
