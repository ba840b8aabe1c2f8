import { CredentialStore } from './credentialStore.js';
import { TokenIssuer } from './tokenIssuer.js';
import type { TokenDenylist } from './tokenDenylist.js';
import { AccountRemovedError, RevokedTokenError } from '../../domain/auth/errors.js';

/**
 * The caller behind a verified bearer token.
 */
export interface Principal {
  userId: string;
  identity: string;
  tokenId: string;
  expiresAt: Date;
}

export class AuthenticateUseCase {
  constructor(
    private tokens: TokenIssuer,
    private denylist: TokenDenylist,
    private credentials: CredentialStore
  ) {}

  async execute(token: string): Promise<Principal> {
    const claims = this.tokens.verify(token);

    if (await this.denylist.isRevoked(claims.tokenId)) {
      throw new RevokedTokenError();
    }

    // Stateless tokens outlive deleted accounts; check the store.
    if (!(await this.credentials.exists(claims.userId))) {
      throw new AccountRemovedError();
    }

    return {
      userId: claims.userId,
      identity: claims.identity,
      tokenId: claims.tokenId,
      expiresAt: claims.expiresAt,
    };
  }
}
