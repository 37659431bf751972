import type { Server } from 'node:http';
import { cfg } from './config/index.js';
import { logger } from './utils/logger.js';
import { wsConnector } from './feed/ws-client.js';
import { StreakMonitor } from './monitor.js';
import { buildApp } from './http/app.js';
import { SseBroadcaster } from './sse/clients.js';
import { createPublisher, redisSnapshotSink, shutdownPublisher } from './publish/redis.js';

const monitor = new StreakMonitor(wsConnector(cfg.feed.url, cfg.feed.timeoutMs), {
  token: cfg.feed.token,
  analysis: cfg.analysis,
  backfill: cfg.backfill,
  timeoutMs: cfg.feed.timeoutMs,
  reconnectDelayMs: cfg.feed.reconnectDelayMs,
});

const sse = new SseBroadcaster();
monitor.hub.subscribe((s) => sse.broadcast(s));

const redis = cfg.redisUrl ? createPublisher(cfg.redisUrl) : null;
if (redis) monitor.hub.subscribe(redisSnapshotSink(redis, cfg.pubsubChannel));

const app = buildApp({
  store: monitor.store,
  hub: monitor.hub,
  config: monitor.config,
  sse,
  isReady: () => monitor.ready,
});

const server: Server = app.listen(cfg.port, () => {
  logger.info(
    {
      env: cfg.env,
      port: cfg.port,
      symbol: cfg.analysis.symbol,
      cycles: `${cfg.analysis.minCycle}..${cfg.analysis.maxCycle}`,
      strength: `${cfg.analysis.minStrength}..${cfg.analysis.maxStrength}`,
      backfillHours: cfg.backfill.hours,
      redis: redis ? cfg.pubsubChannel : undefined,
    },
    'streak-monitor listening'
  );
  logger.info('GET  /api/data');
  logger.info('POST /api/config');
  logger.info('GET  /realtime/snapshots');
  logger.info('GET  /health/liveness');
  logger.info('GET  /health/readiness');
  logger.info('GET  /ops/metrics');
});

if (!cfg.feed.token) logger.warn('FEED_TOKEN not set; requests go out unauthorized');

monitor.start().catch((err: unknown) => {
  logger.error({ err }, 'monitor failed to start');
  void shutdown(1);
});

process.on('uncaughtException', (err) => {
  logger.error({ err }, 'uncaughtException');
  void shutdown(1);
});
process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'unhandledRejection');
  void shutdown(1);
});
process.on('SIGINT', () => void shutdown(0));
process.on('SIGTERM', () => void shutdown(0));

let closing = false;
async function shutdown(code: number) {
  if (closing) return;
  closing = true;
  logger.info('shutting down...');
  setTimeout(() => process.exit(code || 1), 10_000).unref();

  await monitor.stop().catch((err: unknown) => logger.error({ err }, 'monitor stop failed'));
  sse.closeAll();
  await new Promise<void>((resolve) => server.close(() => resolve()));
  if (redis) await shutdownPublisher(redis);
  logger.info('bye');
  process.exit(code);
}
