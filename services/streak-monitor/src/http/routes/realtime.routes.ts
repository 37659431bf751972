import type { IRouter } from 'express';
import type { SseBroadcaster } from '../../sse/clients.js';
import type { SnapshotHub } from '../../state/snapshot-hub.js';

export function realtimeRoutes(r: IRouter, deps: { hub: SnapshotHub; sse: SseBroadcaster }) {
  // GET /realtime/snapshots
  r.get('/realtime/snapshots', (req, res) => {
    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache, no-transform');
    res.setHeader('Connection', 'keep-alive');
    res.setHeader('X-Accel-Buffering', 'no');
    res.flushHeaders();

    const id = deps.sse.add(res, deps.hub.current());
    const cleanup = () => deps.sse.remove(id);
    req.on('close', cleanup);
    req.on('error', cleanup);
  });
}
