import express from 'express';
import { setupOpenAPI } from './openapi/index.js';
import { createCrossCheckRouter } from './routes/crosscheck.js';
import { requestLogger } from './middleware/request-logger.js';
import { errorHandler } from './middleware/error-handler.js';
import type { CrossCheckService } from '../services/crosscheck/index.js';

/** Base64 inflates by a third; leaves headroom over the decoded image limit. */
const BODY_LIMIT = '15mb';

export function createApp(service: CrossCheckService): express.Express {
  const app = express();

  app.use(express.json({ limit: BODY_LIMIT }));
  app.use(requestLogger);

  setupOpenAPI(app);

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.use(createCrossCheckRouter(service));

  app.use(errorHandler);

  return app;
}
