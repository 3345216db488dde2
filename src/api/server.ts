import 'dotenv/config';
import { createApp } from './app.js';
import { createCrossCheckRuntimeFromEnv } from '../services/crosscheck/factory.js';
import { logger } from '../infrastructure/logger.js';

const PORT = parseInt(process.env.PORT ?? '3000', 10);

async function main(): Promise<void> {
  const { service, langfuse, promptName, promptLabel } = createCrossCheckRuntimeFromEnv();

  if (langfuse) {
    await langfuse.warm({ name: promptName, label: promptLabel });
  }

  const app = createApp(service);

  app.listen(PORT, () => {
    logger.info({ port: PORT }, 'Document cross-check API started');
  });
}

main().catch((err) => {
  logger.fatal({ err: err instanceof Error ? err.message : String(err) }, 'Failed to start server');
  process.exit(1);
});
