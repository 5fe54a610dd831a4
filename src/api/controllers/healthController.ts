/**
 * Health and metrics controller for the status server
 */
import type { Request, Response } from 'express';
import type { PrometheusRecorder } from '../../core/Metrics.js';
import { asyncHandler } from '../middleware/index.js';

export interface StatusOptions {
  /** True once the webhook server accepts requests */
  isReady: () => boolean;
  recorder: PrometheusRecorder;
}

export function createHealthController(options: StatusOptions) {
  /**
   * Liveness/readiness for Kubernetes probes
   */
  const healthz = (_req: Request, res: Response): void => {
    if (!options.isReady()) {
      res.status(500).json({ ready: false });
      return;
    }
    res.status(200).json({ ready: true });
  };

  const metrics = asyncHandler(async (_req: Request, res: Response) => {
    const body = await options.recorder.metrics();
    res.set('Content-Type', options.recorder.contentType);
    res.send(body);
  });

  return { healthz, metrics };
}
