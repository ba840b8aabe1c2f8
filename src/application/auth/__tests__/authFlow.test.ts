import { describe, it, expect, beforeEach } from 'vitest';
import type { AuthComponents } from '../../../infra/container.js';
import {
  AccountRemovedError,
  AuthFailureError,
  ExpiredTokenError,
  RevokedTokenError,
} from '../../../domain/auth/errors.js';
import {
  createTestClock,
  createTestComponents,
  TEST_START,
  type TestClock,
} from '../../../testing/fixtures.js';

describe('Auth use cases', () => {
  let testClock: TestClock;
  let auth: AuthComponents;

  beforeEach(() => {
    testClock = createTestClock();
    auth = createTestComponents(testClock.clock, { tokenTtlSeconds: 60 });
  });

  it('should register, login and authenticate', async () => {
    const registered = await auth.register.execute({ identity: 'alice', password: 'Secr3t!' });
    const login = await auth.login.execute({ identity: 'alice', password: 'Secr3t!' });
    const principal = await auth.authenticate.execute(login.token);

    expect(registered.identity).toBe('alice');
    expect(login).toMatchObject({
      tokenType: 'Bearer',
      userId: registered.userId,
      identity: 'alice',
      expiresAt: new Date(TEST_START.getTime() + 60 * 1000).toISOString(),
    });
    expect(principal.userId).toBe(registered.userId);
    expect(principal.identity).toBe('alice');
  });

  it('should reject a wrong password and an unknown identity with the same error', async () => {
    await auth.register.execute({ identity: 'alice', password: 'Secr3t!' });

    const wrong = await auth.login
      .execute({ identity: 'alice', password: 'wrong' })
      .catch((e: unknown) => e);
    const unknown = await auth.login
      .execute({ identity: 'bob', password: 'Secr3t!' })
      .catch((e: unknown) => e);

    expect(wrong).toBeInstanceOf(AuthFailureError);
    expect(unknown).toBeInstanceOf(AuthFailureError);
    expect(wrong).toMatchObject({ code: 'AUTH_FAILURE', message: 'Invalid identity or password' });
    expect(unknown).toMatchObject({ code: 'AUTH_FAILURE', message: 'Invalid identity or password' });
  });

  it('should reject a token once the configured ttl has passed', async () => {
    await auth.register.execute({ identity: 'alice', password: 'Secr3t!' });
    const { token } = await auth.login.execute({ identity: 'alice', password: 'Secr3t!' });

    testClock.advanceSeconds(61);

    await expect(auth.authenticate.execute(token)).rejects.toThrow(ExpiredTokenError);
  });

  it('should reject a token whose account was removed', async () => {
    const { userId } = await auth.register.execute({ identity: 'alice', password: 'Secr3t!' });
    const { token } = await auth.login.execute({ identity: 'alice', password: 'Secr3t!' });

    await auth.userRepo.delete(userId);

    await expect(auth.authenticate.execute(token)).rejects.toThrow(AccountRemovedError);
  });

  it('should reject a token after logout but keep other tokens valid', async () => {
    await auth.register.execute({ identity: 'alice', password: 'Secr3t!' });
    const first = await auth.login.execute({ identity: 'alice', password: 'Secr3t!' });
    const second = await auth.login.execute({ identity: 'alice', password: 'Secr3t!' });

    await auth.logout.execute(await auth.authenticate.execute(first.token));

    await expect(auth.authenticate.execute(first.token)).rejects.toThrow(RevokedTokenError);
    await expect(auth.authenticate.execute(second.token)).resolves.toMatchObject({
      identity: 'alice',
    });
  });
});
