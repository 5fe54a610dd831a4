/**
 * API Routes
 */
import { Router, type Request, type Response, type NextFunction } from 'express';
import type { DNSProvider } from '../../providers/base/DNSProvider.js';
import { createHealthController, createWebhookController, type StatusOptions } from '../controllers/index.js';
import { ApiError } from '../middleware/index.js';

function methodNotAllowed(req: Request, _res: Response, next: NextFunction): void {
  next(ApiError.methodNotAllowed(req.method));
}

/**
 * external-dns webhook protocol routes
 */
export function createWebhookRouter(provider: DNSProvider): Router {
  const router = Router();
  const webhook = createWebhookController(provider);

  router.get('/', webhook.negotiate);
  router.get('/records', webhook.getRecords);
  router.post('/records', webhook.applyChanges);
  router.post('/adjustendpoints', webhook.adjustEndpoints);
  router.all(['/', '/records', '/adjustendpoints'], methodNotAllowed);

  return router;
}

/**
 * Health and metrics routes
 */
export function createStatusRouter(options: StatusOptions): Router {
  const router = Router();
  const health = createHealthController(options);

  router.get('/healthz', health.healthz);
  router.get('/metrics', health.metrics);

  return router;
}
