import { resolve } from 'path';
import { createApplication } from '../app.js';
import { config } from '../config/index.js';
import { logger } from '../shared/utils/logger.js';

/**
 * One-shot inbox run: node dist/workers/index.js [inboxDir]
 */
async function main() {
  const inboxDir = resolve(process.argv[2] ?? config.paths.inboxDir);
  logger.info({ inboxDir }, 'Starting inbox run...');

  const app = createApplication();
  const results = await app.pipeline.processInbox(inboxDir);

  logger.info(results, 'Inbox run complete');

  if (results.failed > 0) {
    process.exitCode = 1;
  }
}

main().catch((error) => {
  logger.error({ error }, 'Inbox run failed');
  process.exit(1);
});
