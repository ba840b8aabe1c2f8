import { randomUUID } from 'crypto';
import { identityKey, type User } from '../../domain/auth/user.js';
import { DuplicateIdentityError } from '../../domain/auth/errors.js';
import { systemClock, type Clock } from '../../application/clock.js';
import type { UserRepo } from './userRepo.js';

/**
 * Process-local user store. Lost on restart.
 * create() checks and inserts without yielding, so it is atomic.
 */
export class InMemoryUserRepo implements UserRepo {
  private readonly usersById = new Map<string, User>();
  private readonly idsByKey = new Map<string, string>();

  constructor(private readonly clock: Clock = systemClock) {}

  async findByIdentity(identity: string): Promise<User | null> {
    const id = this.idsByKey.get(identityKey(identity));
    return id === undefined ? null : (this.usersById.get(id) ?? null);
  }

  async findById(id: string): Promise<User | null> {
    return this.usersById.get(id) ?? null;
  }

  async create(identity: string, passwordHash: string): Promise<User> {
    const key = identityKey(identity);
    if (this.idsByKey.has(key)) {
      throw new DuplicateIdentityError();
    }

    const user: User = {
      id: randomUUID(),
      identity,
      passwordHash,
      createdAt: this.clock(),
    };
    this.usersById.set(user.id, user);
    this.idsByKey.set(key, user.id);
    return user;
  }

  async delete(id: string): Promise<boolean> {
    const user = this.usersById.get(id);
    if (!user) {
      return false;
    }
    this.usersById.delete(id);
    this.idsByKey.delete(identityKey(user.identity));
    return true;
  }

  async ping(): Promise<void> {}
}
