/**
 * Policy Warehouse API server - main entry point.
 */

import { startServer } from './server.js';
import { logger } from './utils/logger.js';

try {
  await startServer();
} catch (err) {
  logger.error({ err }, 'Failed to start server');
  process.exit(1);
}
