import type { Server } from 'node:http';
import express from 'express';
import type { Registry } from 'prom-client';
import { logger } from './logger.js';

const log = logger.child({ module: 'metrics-server' });

export function createMetricsApp(registry: Registry): express.Express {
  const app = express();

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.get('/metrics', async (_req, res, next) => {
    try {
      res.set('Content-Type', registry.contentType);
      res.send(await registry.metrics());
    } catch (err) {
      next(err);
    }
  });

  app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    log.error({ err }, 'Metrics request failed');
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}

export function startMetricsServer(registry: Registry, port: number): Server {
  return createMetricsApp(registry).listen(port, () => {
    log.info({ port }, 'Metrics server listening');
  });
}
