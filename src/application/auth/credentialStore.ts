import { randomUUID } from 'crypto';
import { PasswordHasher } from '../../domain/auth/password.js';
import { PasswordPolicy } from '../../domain/auth/passwordPolicy.js';
import { AuthFailureError, DuplicateIdentityError } from '../../domain/auth/errors.js';
import { normalizeIdentity, type User } from '../../domain/auth/user.js';
import type { UserRepo } from '../../infra/db/userRepo.js';
import { logger } from '../../infra/logger.js';

export interface VerifiedUser {
  userId: string;
  identity: string;
}

/**
 * Owns user records: registration, credential checks and existence
 * lookups. Passwords only ever reach the repository as argon2 hashes.
 */
export class CredentialStore {
  private dummyHash: Promise<string> | undefined;

  constructor(
    private readonly userRepo: UserRepo,
    private readonly hasher: PasswordHasher,
    private readonly policy: PasswordPolicy
  ) {
    // Hashed up front so the first unknown identity costs no more than later ones.
    this.dummyHash = this.startDummyHash();
  }

  async register(identity: string, password: string): Promise<User> {
    this.policy.assertAcceptable(password);

    const normalized = normalizeIdentity(identity);
    const existing = await this.userRepo.findByIdentity(normalized);
    if (existing) {
      throw new DuplicateIdentityError();
    }

    const passwordHash = await this.hasher.hash(password);

    // The lookup above only saves a hash on the common path; create() is
    // the atomic uniqueness check.
    return await this.userRepo.create(normalized, passwordHash);
  }

  async verify(identity: string, password: string): Promise<VerifiedUser> {
    const user = await this.userRepo.findByIdentity(normalizeIdentity(identity));

    if (!user) {
      // Same work as a wrong password so timing does not reveal unknown identities.
      await this.hasher.verify(password, await this.getDummyHash());
      throw new AuthFailureError();
    }

    const isValid = await this.hasher.verify(password, user.passwordHash);
    if (!isValid) {
      throw new AuthFailureError();
    }

    return { userId: user.id, identity: user.identity };
  }

  async exists(userId: string): Promise<boolean> {
    const user = await this.userRepo.findById(userId);
    return user !== null;
  }

  private getDummyHash(): Promise<string> {
    this.dummyHash ??= this.startDummyHash();
    return this.dummyHash;
  }

  private startDummyHash(): Promise<string> {
    const pending = this.hasher.hash(randomUUID());
    // A failed hash is retried on the next unknown identity.
    void pending.catch((error: unknown) => {
      logger.warn('Dummy password hash failed', {
        error: error instanceof Error ? error.message : String(error),
      });
      if (this.dummyHash === pending) {
        this.dummyHash = undefined;
      }
    });
    return pending;
  }
}
