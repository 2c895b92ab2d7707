import { config } from './config.js';
import { openDatabase } from './db/schema.js';
import { PostStore } from './db/queries.js';
import { startServer } from './web/server.js';
import { logger } from './core/logger.js';

function main() {
  logger.info('='.repeat(50));
  logger.info('LinkedIn Toxicity Monitor');
  logger.info('='.repeat(50));

  logger.info(`Opening database at ${config.paths.database}`);
  const db = openDatabase(config.paths.database);
  const store = new PostStore(db);
  logger.info(`${store.count()} posts stored`);

  const server = startServer(store);

  logger.info('');
  logger.info('Commands:');
  logger.info('  npm run scrape -- --search "<query>"   collect posts');
  logger.info('  npm run scrape -- --file queries.txt --resume');
  logger.info('  npm run analyze                         score unscored posts');
  logger.info('');

  const shutdown = () => {
    logger.info('Shutting down...');
    server.close(() => {
      db.close();
      process.exit(0);
    });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

try {
  main();
} catch (error) {
  logger.error('Failed to start:', { error });
  process.exit(1);
}
