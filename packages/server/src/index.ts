import {
  Env,
  createLogger,
  createReleaseResolver,
  loadProfiles,
} from '@resolvarr/core';
import { createApp } from './app.js';

const logger = createLogger('server');

async function start(): Promise<void> {
  const profiles = await loadProfiles(Env.PROFILES_PATH);
  const resolver = createReleaseResolver();
  const app = createApp({ resolver, profiles });

  app.listen(Env.PORT, () => {
    logger.info(`Listening on port ${Env.PORT}`, { version: Env.VERSION });
  });
}

start().catch((error: unknown) => {
  logger.error('Failed to start server', { error });
  process.exit(1);
});
