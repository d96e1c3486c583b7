import express from 'express';
import type { Express } from 'express';
import { createLogger } from './utils/logger.js';
import { RegistryUnavailableError } from './utils/errors.js';
import type { IntentRegistryService } from './core/registry/IntentRegistryService.js';
import { createIntentRouter } from './adapters/http/intentRouter.js';
const logger = createLogger({ component: 'server' });

export function createApp(service: IntentRegistryService): Express {
  const app = express();

  // Middleware
  app.use(express.json({ limit: '5mb' }));

  // Request logging middleware
  app.use((req, _res, next) => {
    logger.debug({ method: req.method, path: req.path }, 'Incoming request');
    next();
  });

  // Routes
  app.use('/', createIntentRouter(service));

  // Error handling
  app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (err instanceof RegistryUnavailableError) {
      res.status(503).json({ error: err.message });
      return;
    }
    logger.error({ error: err }, 'Unhandled error in Express');
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}

export async function startServer(
  service: IntentRegistryService,
  port: number,
  host: string = '0.0.0.0'
): Promise<void> {
  const app = createApp(service);

  return new Promise((resolve) => {
    app.listen(port, host, () => {
      logger.info({ host, port }, 'HTTP server started');
      resolve();
    });
  });
}
