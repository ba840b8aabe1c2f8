import { systemClock, type Clock } from '../clock.js';

/**
 * Revoked token ids. An entry only has to outlive the token it revokes;
 * after that the token fails as expired anyway.
 */
export interface TokenDenylist {
  revoke(tokenId: string, expiresAt: Date): Promise<void>;
  isRevoked(tokenId: string): Promise<boolean>;
}

export class InMemoryTokenDenylist implements TokenDenylist {
  private readonly entries = new Map<string, number>();

  constructor(private readonly clock: Clock = systemClock) {}

  get size(): number {
    return this.entries.size;
  }

  async revoke(tokenId: string, expiresAt: Date): Promise<void> {
    this.prune();
    const expiresAtMs = expiresAt.getTime();
    if (expiresAtMs > this.clock().getTime()) {
      this.entries.set(tokenId, expiresAtMs);
    }
  }

  async isRevoked(tokenId: string): Promise<boolean> {
    const expiresAtMs = this.entries.get(tokenId);
    if (expiresAtMs === undefined) {
      return false;
    }
    if (expiresAtMs <= this.clock().getTime()) {
      this.entries.delete(tokenId);
      return false;
    }
    return true;
  }

  private prune(): void {
    const now = this.clock().getTime();
    for (const [tokenId, expiresAtMs] of this.entries) {
      if (expiresAtMs <= now) {
        this.entries.delete(tokenId);
      }
    }
  }
}
