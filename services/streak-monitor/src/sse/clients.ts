import { randomUUID } from 'node:crypto';
import type { Response } from 'express';
import type { Snapshot } from '../domain/types.js';
import { sseConnections, sseEventsSent } from '../metrics/metrics.js';

type Client = {
  id: string;
  res: Response;
  keepalive: NodeJS.Timeout;
};

function write(res: Response, obj: unknown) {
  res.write(`data: ${JSON.stringify(obj)}\n\n`);
}

/** Fans published snapshots out to Server-Sent Events clients. */
export class SseBroadcaster {
  private readonly clients = new Map<string, Client>();

  constructor(private readonly keepaliveMs = 15000) {}

  add(res: Response, initial: Snapshot): string {
    const id = randomUUID();
    const keepalive = setInterval(() => {
      // comment lines are valid SSE keepalives
      res.write(`: ping ${Date.now()}\n\n`);
    }, this.keepaliveMs);
    keepalive.unref();

    this.clients.set(id, { id, res, keepalive });
    sseConnections.inc();

    write(res, { ok: true, connectedAt: Date.now() });
    write(res, initial);
    return id;
  }

  remove(id: string) {
    const c = this.clients.get(id);
    if (!c) return;
    clearInterval(c.keepalive);
    if (!c.res.writableEnded) c.res.end();
    this.clients.delete(id);
    sseConnections.dec();
  }

  broadcast(s: Snapshot) {
    for (const [id, c] of this.clients) {
      if (c.res.writableEnded) {
        this.remove(id);
        continue;
      }
      write(c.res, s);
      sseEventsSent.inc();
    }
  }

  closeAll() {
    for (const id of [...this.clients.keys()]) this.remove(id);
  }

  size() {
    return this.clients.size;
  }
}
