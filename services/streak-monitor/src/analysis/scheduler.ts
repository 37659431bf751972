// src/analysis/scheduler.ts
import type { King } from '../domain/types.js';
import type { TickStore } from '../store/tick-store.js';
import type { RuntimeConfig } from '../state/runtime-config.js';
import type { SnapshotHub } from '../state/snapshot-hub.js';
import type { StopSignal } from '../utils/stop-signal.js';
import { nowSec } from '../utils/time.js';
import { logger } from '../utils/logger.js';
import { kingsGauge, passDuration } from '../metrics/metrics.js';
import { scanGrid } from './grid.js';

export type SchedulerOptions = {
  store: TickStore;
  hub: SnapshotHub;
  config: RuntimeConfig;
  windowSec: number;
  intervalMs: number;
  minCandles: number;
  /** Latest live price; falls back to the newest stored tick. */
  price?: () => number | null;
  now?: () => number;
};

export class AnalysisScheduler {
  constructor(private readonly opts: SchedulerOptions) {}

  /** One full grid scan, published. A failing scan publishes no kings. */
  async runPass(): Promise<King[]> {
    const { store, hub, config, windowSec, minCandles } = this.opts;
    const cfgNow = config.get();
    const endTimer = passDuration.startTimer();

    let kings: King[] = [];
    try {
      const since = (this.opts.now ?? nowSec)() - windowSec;
      const ticks = store.rangeSince(since);
      kings = await scanGrid(ticks, cfgNow, { minCandles });
      logger.debug({ ticks: ticks.length, kings: kings.length }, 'analysis pass done');
    } catch (err) {
      logger.error({ err }, 'analysis pass failed');
      kings = [];
    } finally {
      endTimer();
    }

    kingsGauge.set(kings.length);
    hub.publish({ kings, config: cfgNow, price: this.opts.price?.() ?? store.latestPrice() });
    return kings;
  }

  /** Passes start every `intervalMs`; a slow pass eats into the following sleep. */
  async run(stop: StopSignal): Promise<void> {
    this.opts.hub.setStatus('Active');
    while (!stop.raised) {
      const started = Date.now();
      await this.runPass();
      if (stop.raised) break;
      await stop.wait(nextDelay(this.opts.intervalMs, Date.now() - started));
    }
    logger.info('analysis scheduler stopped');
  }
}

export function nextDelay(intervalMs: number, elapsedMs: number): number {
  return Math.max(0, intervalMs - elapsedMs);
}
