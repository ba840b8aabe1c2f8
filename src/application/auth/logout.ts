import type { Principal } from './authenticate.js';
import type { TokenDenylist } from './tokenDenylist.js';
import { logger } from '../../infra/logger.js';

export class LogoutUseCase {
  constructor(private denylist: TokenDenylist) {}

  async execute(principal: Principal): Promise<void> {
    await this.denylist.revoke(principal.tokenId, principal.expiresAt);
    logger.info('User logged out', { userId: principal.userId, tokenId: principal.tokenId });
  }
}
