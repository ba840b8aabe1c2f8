import { argon2id, hash, verify } from 'argon2';

export interface PasswordHashingOptions {
  /** KiB */
  memoryCost: number;
  timeCost: number;
  parallelism: number;
}

export const DEFAULT_HASHING_OPTIONS: PasswordHashingOptions = {
  memoryCost: 65536,
  timeCost: 3,
  parallelism: 1,
};

/**
 * Password hashing using Argon2id. The encoded hash carries its own salt
 * and parameters, so verification works across cost changes.
 */
export class PasswordHasher {
  constructor(
    private readonly options: PasswordHashingOptions = DEFAULT_HASHING_OPTIONS
  ) {}

  /**
   * Hash a plain text password with a fresh random salt.
   */
  async hash(plainPassword: string): Promise<string> {
    return await hash(plainPassword, {
      type: argon2id,
      memoryCost: this.options.memoryCost,
      timeCost: this.options.timeCost,
      parallelism: this.options.parallelism,
    });
  }

  /**
   * Verify a plain password against an encoded hash. argon2 compares the
   * digests with crypto.timingSafeEqual. An unparseable hash is a mismatch.
   */
  async verify(plainPassword: string, encodedHash: string): Promise<boolean> {
    try {
      return await verify(encodedHash, plainPassword);
    } catch {
      return false;
    }
  }
}
