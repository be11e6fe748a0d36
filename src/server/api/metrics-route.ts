import { Router } from 'express';
import { METRICS_CONTENT_TYPE } from '../metrics/exporter.js';
import type { MetricsContext } from './types.js';

export function makeMetricsRoute(ctx: MetricsContext): Router {
  const router = Router();
  router.get('/metrics', (_req, res) => {
    res.setHeader('Content-Type', METRICS_CONTENT_TYPE);
    res.send(ctx.registry.export(ctx.now()));
  });
  return router;
}
