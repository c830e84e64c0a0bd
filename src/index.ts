/**
 * sqlchat server - main entry point
 */

import { loadConfig, loadDotenv } from './config.js';
import { startServer } from './server.js';
import { logger } from './utils/logger.js';

try {
  loadDotenv();
  await startServer(loadConfig());
} catch (err) {
  logger.error(err);
  process.exit(1);
}
