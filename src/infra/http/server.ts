import dotenv from 'dotenv';
import { loadConfig } from '../../config.js';
import { createAuthComponents } from '../container.js';
import { createApp } from './app.js';
import { logger } from '../logger.js';

dotenv.config();

const config = loadConfig();
logger.setLevel(config.logLevel);

const components = createAuthComponents(config.auth, config.storage);
const app = createApp(components, config.rateLimit);

const server = app.listen(config.port, () => {
  logger.info(`Server running on http://localhost:${config.port}`, {
    env: config.env,
    store: config.storage.kind,
  });
  logger.info(`API docs: http://localhost:${config.port}/docs`);
});

function shutdown(signal: string): void {
  logger.info('Shutting down', { signal });
  server.close((closeError) => {
    components
      .close()
      .then(() => process.exit(closeError ? 1 : 0))
      .catch((error: unknown) => {
        logger.error('Failed to close stores', error);
        process.exit(1);
      });
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
