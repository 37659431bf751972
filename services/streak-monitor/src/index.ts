export * from './domain/types.js';
export { SORT_KEY_SCALE, liveTick, batchTicks } from './domain/ticks.js';
export { TickStore } from './store/tick-store.js';
export type { FeedConnector, FeedSession } from './feed/session.js';
export { WsFeedSession, wsConnector } from './feed/ws-client.js';
export { planChunks, fetchChunk, runBackfill, type BackfillReport, type Chunk } from './ingest/backfill.js';
export { LiveSubscriber, type LiveState } from './ingest/live-subscriber.js';
export { aggregateCandles, bucketStart, candleColor, timeframeLabel } from './analysis/candles.js';
export { buildHistogram, scoreCandles, scoreHistogram, strength } from './analysis/streaks.js';
export { foldKings, rankKings } from './analysis/kings.js';
export { scanGrid } from './analysis/grid.js';
export { AnalysisScheduler } from './analysis/scheduler.js';
export { RuntimeConfig } from './state/runtime-config.js';
export { SnapshotHub } from './state/snapshot-hub.js';
export { StreakMonitor, type MonitorSettings } from './monitor.js';
export { FetchError } from './utils/errors.js';
export type { Result } from './utils/result.js';
