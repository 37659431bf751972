import type { IRouter } from 'express';
import type { TickStore } from '../../store/tick-store.js';

export function healthRoutes(r: IRouter, deps: { store: TickStore; isReady: () => boolean }) {
  r.get('/health/liveness', (_req, res) => res.json({ ok: true }));
  r.get('/health/readiness', (_req, res) => {
    const ready = deps.isReady();
    res.status(ready ? 200 : 503).json({
      status: ready ? 'ready' : 'not_ready',
      checks: { backfill: ready ? 'ok' : 'pending' },
      ticks: deps.store.count(),
    });
  });
}
