import { loadConfig } from './config/env.js';
import { createApp } from './app.js';
import { SkyscannerClient } from './services/skyscanner.js';
import { configureLogging, logger } from './utils/logger.js';

async function main() {
  const config = loadConfig();
  configureLogging(config);
  const client = await SkyscannerClient.create(config.search);
  const app = createApp(client);

  app.listen(config.port, () => {
    logger.info(`Server running on port ${config.port}`, {
      health: `http://localhost:${config.port}/api/health`,
      market: config.search.market,
      maxRetries: config.search.maxRetries,
      retryDelay: config.search.retryDelay
    });
  });
}

main().catch(error => {
  logger.error('Failed to start server', {
    error: error instanceof Error ? error.message : 'Unknown error',
    stack: error instanceof Error ? error.stack : undefined
  });
  process.exit(1);
});
