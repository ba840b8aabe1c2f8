import { CredentialStore } from './credentialStore.js';
import { TokenIssuer } from './tokenIssuer.js';
import { AuthFailureError } from '../../domain/auth/errors.js';
import { logger } from '../../infra/logger.js';

export interface LoginCommand {
  identity: string;
  password: string;
}

export interface LoginResult {
  token: string;
  tokenType: 'Bearer';
  expiresAt: string;
  userId: string;
  identity: string;
}

export class LoginUseCase {
  constructor(
    private credentials: CredentialStore,
    private tokens: TokenIssuer,
    private tokenTtlSeconds: number
  ) {}

  async execute(command: LoginCommand): Promise<LoginResult> {
    const user = await this.credentials
      .verify(command.identity, command.password)
      .catch((error: unknown) => {
        if (error instanceof AuthFailureError) {
          logger.warn('Login rejected');
        }
        throw error;
      });

    const issued = this.tokens.issue(user, this.tokenTtlSeconds);

    logger.info('User logged in', { userId: user.userId, tokenId: issued.tokenId });

    return {
      token: issued.token,
      tokenType: 'Bearer',
      expiresAt: issued.expiresAt.toISOString(),
      userId: user.userId,
      identity: user.identity,
    };
  }
}
