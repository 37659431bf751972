import { Counter, Gauge, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

export const registry = new Registry();
collectDefaultMetrics({ register: registry });

export const ticksInserted = new Counter({
  name: 'ticks_inserted_total',
  help: 'Ticks accepted into the store (duplicates excluded)',
  labelNames: ['source'],
  registers: [registry],
});

export const tickStoreSize = new Gauge({
  name: 'tick_store_size',
  help: 'Ticks currently held in memory',
  registers: [registry],
});

export const backfillChunks = new Counter({
  name: 'backfill_chunks_total',
  help: 'Backfill chunks by outcome',
  labelNames: ['result'],
  registers: [registry],
});

export const liveReconnects = new Counter({
  name: 'live_reconnects_total',
  help: 'Live subscription reconnect attempts after a failure',
  registers: [registry],
});

export const liveTicks = new Counter({
  name: 'live_ticks_total',
  help: 'Tick messages received on the live subscription',
  registers: [registry],
});

export const passDuration = new Histogram({
  name: 'analysis_pass_duration_seconds',
  help: 'Duration of one full grid scan',
  buckets: [0.1, 0.5, 1, 2, 5, 10, 20, 30, 60],
  registers: [registry],
});

export const kingsGauge = new Gauge({
  name: 'analysis_kings',
  help: 'Kings published by the last pass',
  registers: [registry],
});

export const sseConnections = new Gauge({
  name: 'sse_connections',
  help: 'Active snapshot SSE connections',
  registers: [registry],
});

export const sseEventsSent = new Counter({
  name: 'sse_events_sent_total',
  help: 'Snapshot events delivered over SSE',
  registers: [registry],
});
