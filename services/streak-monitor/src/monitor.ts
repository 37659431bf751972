// src/monitor.ts
import type { AnalysisConfig } from './domain/types.js';
import { TickStore } from './store/tick-store.js';
import type { FeedConnector } from './feed/session.js';
import { runBackfill, type BackfillReport } from './ingest/backfill.js';
import { LiveSubscriber } from './ingest/live-subscriber.js';
import { AnalysisScheduler } from './analysis/scheduler.js';
import { RuntimeConfig } from './state/runtime-config.js';
import { SnapshotHub } from './state/snapshot-hub.js';
import { StopSignal } from './utils/stop-signal.js';
import { nowSec } from './utils/time.js';
import { logger } from './utils/logger.js';

export type MonitorSettings = {
  token: string;
  analysis: AnalysisConfig & { windowSec: number; intervalMs: number; minCandles: number };
  backfill: { hours: number; chunkSec: number; concurrency: number };
  timeoutMs: number;
  reconnectDelayMs: number;
};

/**
 * Wires the pipeline: one backfill, then the live subscription and the analysis loop
 * running side by side until `stop()`.
 */
export class StreakMonitor {
  readonly store = new TickStore();
  readonly config: RuntimeConfig;
  readonly hub: SnapshotHub;
  readonly subscriber: LiveSubscriber;
  readonly scheduler: AnalysisScheduler;

  private readonly signal = new StopSignal();
  private loops: Promise<void>[] = [];
  private backfilled = false;

  constructor(
    private readonly connector: FeedConnector,
    private readonly settings: MonitorSettings,
    private readonly now: () => number = nowSec,
  ) {
    const { windowSec, intervalMs, minCandles, ...initial } = settings.analysis;
    this.config = new RuntimeConfig(initial);
    this.hub = new SnapshotHub(initial);

    this.subscriber = new LiveSubscriber({
      connector,
      store: this.store,
      symbol: initial.symbol,
      token: settings.token,
      reconnectDelayMs: settings.reconnectDelayMs,
      requestTimeoutMs: settings.timeoutMs,
      onTick: (tick) => this.hub.setPrice(tick.price),
    });

    this.scheduler = new AnalysisScheduler({
      store: this.store,
      hub: this.hub,
      config: this.config,
      windowSec,
      intervalMs,
      minCandles,
      price: () => this.subscriber.lastPrice,
      now,
    });
  }

  get ready(): boolean {
    return this.backfilled;
  }

  get stopped(): boolean {
    return this.signal.raised;
  }

  /** Resolves once backfill is done and both loops are running. */
  async start(): Promise<BackfillReport> {
    const { symbol } = this.config.get();
    const endTime = this.now();
    const startTime = endTime - Math.floor(this.settings.backfill.hours * 3600);

    this.hub.setStatus('Backfilling...');
    const report = await runBackfill({
      connector: this.connector,
      store: this.store,
      symbol,
      token: this.settings.token,
      startTime,
      endTime,
      chunkSec: this.settings.backfill.chunkSec,
      concurrency: this.settings.backfill.concurrency,
      timeoutMs: this.settings.timeoutMs,
    });
    this.backfilled = true;

    if (this.signal.raised) return report;
    this.loops = [this.subscriber.run(this.signal), this.scheduler.run(this.signal)];
    logger.info({ symbol, ticks: this.store.count() }, 'monitor active');
    return report;
  }

  async stop(): Promise<void> {
    this.signal.raise();
    this.subscriber.close();
    await Promise.all(this.loops);
    this.hub.setStatus('Stopped');
  }
}
