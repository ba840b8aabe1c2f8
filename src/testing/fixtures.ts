import type { AuthConfig } from '../config.js';
import type { Clock } from '../application/clock.js';
import { DEFAULT_PASSWORD_POLICY } from '../domain/auth/passwordPolicy.js';
import type { PasswordHashingOptions } from '../domain/auth/password.js';
import { createAuthComponents, type AuthComponents } from '../infra/container.js';

export const TEST_SECRET = 'test-secret-for-unit-tests';

// Cheap argon2 costs for tests
export const FAST_HASHING: PasswordHashingOptions = {
  memoryCost: 4096,
  timeCost: 2,
  parallelism: 1,
};

export const TEST_START = new Date('2026-01-01T00:00:00.000Z');

export interface TestClock {
  clock: Clock;
  advanceSeconds(seconds: number): void;
}

export function createTestClock(start: Date = TEST_START): TestClock {
  let now = start.getTime();
  return {
    clock: () => new Date(now),
    advanceSeconds(seconds: number) {
      now += seconds * 1000;
    },
  };
}

export function testAuthConfig(overrides: Partial<AuthConfig> = {}): AuthConfig {
  return {
    jwtSecret: TEST_SECRET,
    tokenTtlSeconds: 3600,
    passwordPolicy: DEFAULT_PASSWORD_POLICY,
    hashing: FAST_HASHING,
    ...overrides,
  };
}

export function createTestComponents(
  clock: Clock,
  overrides: Partial<AuthConfig> = {}
): AuthComponents {
  return createAuthComponents(testAuthConfig(overrides), { kind: 'memory' }, clock);
}
