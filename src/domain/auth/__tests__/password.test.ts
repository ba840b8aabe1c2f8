import { describe, it, expect } from 'vitest';
import { PasswordHasher } from '../password.js';
import { FAST_HASHING } from '../../../testing/fixtures.js';

describe('PasswordHasher', () => {
  const hasher = new PasswordHasher(FAST_HASHING);

  it('should never store the plain password', async () => {
    const encoded = await hasher.hash('Secr3t!');

    expect(encoded).not.toBe('Secr3t!');
    expect(encoded.startsWith('$argon2id$')).toBe(true);
  });

  it('should salt every hash', async () => {
    const first = await hasher.hash('Secr3t!');
    const second = await hasher.hash('Secr3t!');

    expect(first).not.toBe(second);
  });

  it('should verify only the exact password', async () => {
    const encoded = await hasher.hash('Secr3t!');

    expect(await hasher.verify('Secr3t!', encoded)).toBe(true);
    expect(await hasher.verify('secr3t!', encoded)).toBe(false);
    expect(await hasher.verify('Secr3t', encoded)).toBe(false);
  });

  it('should treat an unparseable hash as a mismatch', async () => {
    expect(await hasher.verify('Secr3t!', 'not-a-hash')).toBe(false);
  });
});
