import type { Pool } from 'pg';
import type { User } from '../../domain/auth/user.js';
import { DuplicateIdentityError } from '../../domain/auth/errors.js';

/**
 * Persistence for user records. `create` must reject a taken identity
 * atomically with DuplicateIdentityError; identities compare
 * case-insensitively.
 */
export interface UserRepo {
  findByIdentity(identity: string): Promise<User | null>;
  findById(id: string): Promise<User | null>;
  create(identity: string, passwordHash: string): Promise<User>;
  delete(id: string): Promise<boolean>;
  ping(): Promise<void>;
}

type UserRow = {
  id: string;
  identity: string;
  password_hash: string;
  created_at: Date;
};

const UNIQUE_VIOLATION = '23505';

function toUser(row: UserRow): User {
  return {
    id: row.id,
    identity: row.identity,
    passwordHash: row.password_hash,
    createdAt: row.created_at,
  };
}

function isUniqueViolation(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === UNIQUE_VIOLATION
  );
}

export class PgUserRepo implements UserRepo {
  constructor(private readonly pool: Pool) {}

  async findByIdentity(identity: string): Promise<User | null> {
    const result = await this.pool.query<UserRow>(
      `SELECT id, identity, password_hash, created_at
       FROM users
       WHERE LOWER(identity) = LOWER($1)`,
      [identity]
    );

    const row = result.rows[0];
    return row ? toUser(row) : null;
  }

  async findById(id: string): Promise<User | null> {
    const result = await this.pool.query<UserRow>(
      'SELECT id, identity, password_hash, created_at FROM users WHERE id = $1',
      [id]
    );

    const row = result.rows[0];
    return row ? toUser(row) : null;
  }

  async create(identity: string, passwordHash: string): Promise<User> {
    try {
      const result = await this.pool.query<UserRow>(
        `INSERT INTO users (identity, password_hash)
         VALUES ($1, $2)
         RETURNING id, identity, password_hash, created_at`,
        [identity, passwordHash]
      );
      return toUser(result.rows[0]);
    } catch (error) {
      // users_identity_lower_key
      if (isUniqueViolation(error)) {
        throw new DuplicateIdentityError();
      }
      throw error;
    }
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.pool.query('DELETE FROM users WHERE id = $1', [id]);
    return (result.rowCount ?? 0) > 0;
  }

  async ping(): Promise<void> {
    await this.pool.query('SELECT 1');
  }
}
