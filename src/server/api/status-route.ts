import { Router } from 'express';
import type { MetricsContext } from './types.js';

export function makeStatusRoute(ctx: MetricsContext): Router {
  const router = Router();
  router.get('/healthz', (_req, res) => {
    const snapshot = ctx.registry.snapshot(ctx.now());
    res.json({
      ok: true,
      connections: snapshot.connectionsCount,
      connectionsTotal: snapshot.connectionsTotal,
      uptimeSeconds: snapshot.uptimeSeconds
    });
  });
  return router;
}
