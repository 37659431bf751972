import type { IRouter } from 'express';
import { ConfigUpdateBody } from '../../utils/validators.js';
import { toWireConfig, type RuntimeConfig } from '../../state/runtime-config.js';
import type { SnapshotHub } from '../../state/snapshot-hub.js';

export function dashboardRoutes(r: IRouter, deps: { hub: SnapshotHub; config: RuntimeConfig }) {
  // keep-alive probe for hosts that ping the root path
  r.get('/', (_req, res) => {
    res.type('text/plain').send(`Streak monitor is running (${deps.hub.current().status})`);
  });

  r.get('/api/data', (_req, res) => {
    res.json(deps.hub.current());
  });

  r.post('/api/config', (req, res) => {
    const parsed = ConfigUpdateBody.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: { code: 'VALIDATION_ERROR', message: parsed.error.message } });
      return;
    }
    const updated = deps.config.update(parsed.data);
    res.json({ ok: true, config: toWireConfig(updated) });
  });
}
