/**
 * external-dns Webhook Controller
 */
import type { Request, Response } from 'express';
import type { DNSProvider } from '../../providers/base/DNSProvider.js';
import { asyncHandler } from '../middleware/index.js';
import { changesSchema, endpointsSchema } from '../validation.js';

export const WEBHOOK_MEDIA_TYPE = 'application/external.dns.webhook+json;version=1';

/**
 * Signal aborted when the client goes away before the response is sent
 */
function requestSignal(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) {
      controller.abort(new Error('client closed the request'));
    }
  });
  return controller.signal;
}

/**
 * Sends JSON with the webhook media type unchanged (res.json appends a charset)
 */
function sendWebhookJson(res: Response, body: unknown): void {
  res.set('Content-Type', WEBHOOK_MEDIA_TYPE);
  res.set('Vary', 'Content-Type');
  res.send(Buffer.from(JSON.stringify(body)));
}

export function createWebhookController(provider: DNSProvider) {
  /**
   * Negotiation: report the domain filter
   */
  const negotiate = (_req: Request, res: Response): void => {
    sendWebhookJson(res, provider.getDomainFilter().toJSON());
  };

  /**
   * Current records as endpoints
   */
  const getRecords = asyncHandler(async (_req: Request, res: Response) => {
    const endpoints = await provider.records(requestSignal(res));
    sendWebhookJson(res, endpoints);
  });

  /**
   * Apply a change batch
   */
  const applyChanges = asyncHandler(async (req: Request, res: Response) => {
    const changes = changesSchema.parse(req.body);
    await provider.applyChanges(changes, requestSignal(res));
    res.status(204).end();
  });

  const adjustEndpoints = (req: Request, res: Response): void => {
    const endpoints = endpointsSchema.parse(req.body);
    sendWebhookJson(res, provider.adjustEndpoints(endpoints));
  };

  return { negotiate, getRecords, applyChanges, adjustEndpoints };
}

export type WebhookController = ReturnType<typeof createWebhookController>;
