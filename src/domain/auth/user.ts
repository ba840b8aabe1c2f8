/**
 * User record owned by the credential store.
 * `identity` keeps the casing it was registered with; uniqueness is
 * case-insensitive (see identityKey).
 */
export interface User {
  readonly id: string;
  readonly identity: string;
  readonly passwordHash: string;
  readonly createdAt: Date;
}

export function normalizeIdentity(identity: string): string {
  return identity.trim();
}

/**
 * Key used to compare identities for uniqueness and lookup.
 */
export function identityKey(identity: string): string {
  return normalizeIdentity(identity).toLowerCase();
}
