import type { IRouter } from 'express';
import { registry } from '../../metrics/metrics.js';

export function opsRoutes(r: IRouter) {
  r.get('/ops/metrics', async (_req, res, next) => {
    try {
      res.setHeader('Content-Type', registry.contentType);
      res.end(await registry.metrics());
    } catch (err) {
      next(err);
    }
  });
}
