import type { AuthConfig, StorageConfig } from '../config.js';
import { systemClock, type Clock } from '../application/clock.js';
import { CredentialStore } from '../application/auth/credentialStore.js';
import { TokenIssuer } from '../application/auth/tokenIssuer.js';
import { InMemoryTokenDenylist, type TokenDenylist } from '../application/auth/tokenDenylist.js';
import { RegisterUseCase } from '../application/auth/register.js';
import { LoginUseCase } from '../application/auth/login.js';
import { AuthenticateUseCase } from '../application/auth/authenticate.js';
import { LogoutUseCase } from '../application/auth/logout.js';
import { PasswordHasher } from '../domain/auth/password.js';
import { PasswordPolicy } from '../domain/auth/passwordPolicy.js';
import { PgUserRepo, type UserRepo } from './db/userRepo.js';
import { InMemoryUserRepo } from './db/inMemoryUserRepo.js';
import { PgTokenDenylist } from './db/tokenDenylistRepo.js';
import { createPool } from './db/pool.js';

export interface AuthComponents {
  userRepo: UserRepo;
  register: RegisterUseCase;
  login: LoginUseCase;
  authenticate: AuthenticateUseCase;
  logout: LogoutUseCase;
  healthCheck: () => Promise<void>;
  close: () => Promise<void>;
}

interface Stores {
  userRepo: UserRepo;
  denylist: TokenDenylist;
  close: () => Promise<void>;
}

function createStores(storage: StorageConfig, clock: Clock): Stores {
  if (storage.kind === 'postgres') {
    const pool = createPool(storage.databaseUrl);
    return {
      userRepo: new PgUserRepo(pool),
      denylist: new PgTokenDenylist(pool),
      close: () => pool.end(),
    };
  }

  return {
    userRepo: new InMemoryUserRepo(clock),
    denylist: new InMemoryTokenDenylist(clock),
    close: async () => {},
  };
}

/**
 * Wire the auth core for the configured store.
 */
export function createAuthComponents(
  auth: AuthConfig,
  storage: StorageConfig,
  clock: Clock = systemClock
): AuthComponents {
  const { userRepo, denylist, close } = createStores(storage, clock);

  const credentials = new CredentialStore(
    userRepo,
    new PasswordHasher(auth.hashing),
    new PasswordPolicy(auth.passwordPolicy)
  );
  const tokens = new TokenIssuer(auth.jwtSecret, clock);

  return {
    userRepo,
    register: new RegisterUseCase(credentials),
    login: new LoginUseCase(credentials, tokens, auth.tokenTtlSeconds),
    authenticate: new AuthenticateUseCase(tokens, denylist, credentials),
    logout: new LogoutUseCase(denylist),
    healthCheck: () => userRepo.ping(),
    close,
  };
}
