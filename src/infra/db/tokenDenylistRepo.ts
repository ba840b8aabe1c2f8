import type { Pool } from 'pg';
import type { TokenDenylist } from '../../application/auth/tokenDenylist.js';

export class PgTokenDenylist implements TokenDenylist {
  constructor(private readonly pool: Pool) {}

  async revoke(tokenId: string, expiresAt: Date): Promise<void> {
    await this.pool.query('DELETE FROM revoked_tokens WHERE expires_at <= NOW()');
    await this.pool.query(
      `INSERT INTO revoked_tokens (token_id, expires_at)
       VALUES ($1, $2)
       ON CONFLICT (token_id) DO NOTHING`,
      [tokenId, expiresAt]
    );
  }

  async isRevoked(tokenId: string): Promise<boolean> {
    const result = await this.pool.query<{ token_id: string }>(
      `SELECT token_id
       FROM revoked_tokens
       WHERE token_id = $1 AND expires_at > NOW()`,
      [tokenId]
    );
    return result.rows.length > 0;
  }
}
