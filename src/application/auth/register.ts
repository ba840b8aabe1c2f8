import { CredentialStore } from './credentialStore.js';
import { logger } from '../../infra/logger.js';

export interface RegisterCommand {
  identity: string;
  password: string;
}

export interface RegisterResult {
  userId: string;
  identity: string;
}

export class RegisterUseCase {
  constructor(private credentials: CredentialStore) {}

  async execute(command: RegisterCommand): Promise<RegisterResult> {
    const user = await this.credentials.register(command.identity, command.password);

    logger.info('User registered', { userId: user.id });

    return {
      userId: user.id,
      identity: user.identity,
    };
  }
}
