import * as dotenv from 'dotenv';
import { createApp } from './app';
import { DEFAULT_CONFIG_FILE, loadConfig } from './config/config';
import { ContactStore } from './db/contactStore';
import { ConfigurationError } from './lib/errors';
import logger from './lib/logger';
import { PlacesClient } from './places/placesClient';

dotenv.config();

async function main(): Promise<void> {
  const config = loadConfig(process.env.CONTACT_MANAGER_CONFIG || DEFAULT_CONFIG_FILE);
  const store = new ContactStore(config.database);
  const places = new PlacesClient(config.places);
  logger.info(`Starting contact manager with ${store} and ${places}`);

  if ((await store.checkDatabase()) === null || !(await store.ensureSchema())) {
    logger.warn('Database is not ready; contact operations will fail until it is reachable');
  }

  const port = parseInt(process.env.PORT || '3000', 10) || 3000;
  createApp({ store, places }).listen(port, () => {
    logger.info(`Contact manager listening on port ${port}`);
  });
}

main().catch((error: unknown) => {
  if (error instanceof ConfigurationError) {
    logger.error(`Configuration error: ${error.message}`);
  } else {
    logger.error('Failed to start contact manager', { error });
  }
  process.exit(1);
});
