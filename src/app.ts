/**
 * Express Application Setup
 */
import express, { type Express, type Request, type Response, type NextFunction } from 'express';
import type { Server } from 'http';
import { logger } from './core/Logger.js';
import type { DNSProvider } from './providers/base/DNSProvider.js';
import {
  createStatusRouter,
  createWebhookRouter,
  errorHandler,
  notFoundHandler,
  type StatusOptions,
} from './api/index.js';

function requestLogger(req: Request, _res: Response, next: NextFunction): void {
  logger.debug({ method: req.method, url: req.url }, 'Request received');
  next();
}

/**
 * Webhook API consumed by external-dns
 */
export function createWebhookApp(provider: DNSProvider): Express {
  const app = express();

  // external-dns sends its own media type; parse it as JSON
  app.use(express.json({ limit: '10mb', type: ['application/json', '+json'] }));
  app.use(requestLogger);

  app.use('/', createWebhookRouter(provider));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}

/**
 * Status server exposing health and Prometheus metrics
 */
export function createStatusApp(options: StatusOptions): Express {
  const app = express();

  app.use('/', createStatusRouter(options));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}

/**
 * Start listening and resolve with the server once bound
 */
export function startServer(app: Express, host: string, port: number, name: string): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host, () => {
      logger.info({ host, port }, `${name} server started`);
      resolve(server);
    });

    server.on('error', (error) => {
      logger.error({ error }, `${name} server error`);
      reject(error);
    });
  });
}

export function stopServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}
