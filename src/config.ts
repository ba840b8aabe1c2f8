import { z } from 'zod';
import type { PasswordPolicyOptions } from './domain/auth/passwordPolicy.js';
import type { PasswordHashingOptions } from './domain/auth/password.js';
import type { LogThreshold } from './infra/logger.js';

export class ConfigError extends Error {
  constructor(public readonly variables: string[]) {
    super(`Invalid configuration: ${variables.join(', ')}`);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

const flag = z
  .enum(['true', 'false'])
  .default('false')
  .transform((value) => value === 'true');

const positiveInt = z.coerce.number().int().positive();

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    PORT: positiveInt.default(8000),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
    JWT_SECRET: z.string().min(16, 'JWT_SECRET must be at least 16 characters'),
    TOKEN_TTL_SECONDS: z.coerce.number().int().nonnegative().default(86400),
    USER_STORE: z.enum(['memory', 'postgres']).default('memory'),
    DATABASE_URL: z.string().min(1).optional(),
    PASSWORD_MIN_LENGTH: positiveInt.default(6),
    PASSWORD_MAX_LENGTH: positiveInt.default(200),
    PASSWORD_REQUIRE_LETTER: flag,
    PASSWORD_REQUIRE_DIGIT: flag,
    PASSWORD_REQUIRE_SYMBOL: flag,
    ARGON2_MEMORY_COST: z.coerce.number().int().min(1024).default(65536),
    ARGON2_TIME_COST: z.coerce.number().int().min(2).default(3),
    ARGON2_PARALLELISM: positiveInt.default(1),
    API_RATE_LIMIT_PER_MINUTE: positiveInt.default(60),
    LOGIN_RATE_LIMIT_PER_MINUTE: positiveInt.default(10),
  })
  .superRefine((env, ctx) => {
    if (env.USER_STORE === 'postgres' && !env.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_URL'],
        message: 'DATABASE_URL is required when USER_STORE=postgres',
      });
    }
    if (env.PASSWORD_MAX_LENGTH < env.PASSWORD_MIN_LENGTH) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['PASSWORD_MAX_LENGTH'],
        message: 'PASSWORD_MAX_LENGTH must not be below PASSWORD_MIN_LENGTH',
      });
    }
  });

export type StorageConfig =
  | { kind: 'memory' }
  | { kind: 'postgres'; databaseUrl: string };

export interface RateLimitConfig {
  apiPerMinute: number;
  loginPerMinute: number;
}

export interface AuthConfig {
  jwtSecret: string;
  tokenTtlSeconds: number;
  passwordPolicy: PasswordPolicyOptions;
  hashing: PasswordHashingOptions;
}

export interface AppConfig {
  env: 'development' | 'test' | 'production';
  port: number;
  logLevel: LogThreshold;
  auth: AuthConfig;
  storage: StorageConfig;
  rateLimit: RateLimitConfig;
}

/**
 * Validate the environment once at startup. Errors name the offending
 * variables only; values are never echoed since some are secrets.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const variables = [...new Set(parsed.error.issues.map((issue) => issue.path.join('.')))];
    throw new ConfigError(variables);
  }

  const e = parsed.data;
  return {
    env: e.NODE_ENV,
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    auth: {
      jwtSecret: e.JWT_SECRET,
      tokenTtlSeconds: e.TOKEN_TTL_SECONDS,
      passwordPolicy: {
        minLength: e.PASSWORD_MIN_LENGTH,
        maxLength: e.PASSWORD_MAX_LENGTH,
        requireLetter: e.PASSWORD_REQUIRE_LETTER,
        requireDigit: e.PASSWORD_REQUIRE_DIGIT,
        requireSymbol: e.PASSWORD_REQUIRE_SYMBOL,
      },
      hashing: {
        memoryCost: e.ARGON2_MEMORY_COST,
        timeCost: e.ARGON2_TIME_COST,
        parallelism: e.ARGON2_PARALLELISM,
      },
    },
    storage:
      e.USER_STORE === 'postgres' && e.DATABASE_URL
        ? { kind: 'postgres', databaseUrl: e.DATABASE_URL }
        : { kind: 'memory' },
    rateLimit: {
      apiPerMinute: e.API_RATE_LIMIT_PER_MINUTE,
      loginPerMinute: e.LOGIN_RATE_LIMIT_PER_MINUTE,
    },
  };
}
