// src/ingest/live-subscriber.ts
import type { Tick } from '../domain/types.js';
import { liveTick } from '../domain/ticks.js';
import type { TickStore } from '../store/tick-store.js';
import type { FeedConnector, FeedSession } from '../feed/session.js';
import { TickReply, type FeedMessage } from '../feed/protocol.js';
import type { StopSignal } from '../utils/stop-signal.js';
import { toFetchError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { liveReconnects, liveTicks, ticksInserted, tickStoreSize } from '../metrics/metrics.js';

export type LiveState = 'disconnected' | 'authorizing' | 'subscribed';

export type LiveSubscriberOptions = {
  connector: FeedConnector;
  store: TickStore;
  symbol: string;
  token: string;
  reconnectDelayMs?: number;
  requestTimeoutMs?: number;
  onTick?: (tick: Tick, inserted: boolean) => void;
  onStateChange?: (state: LiveState) => void;
};

export class LiveSubscriber {
  private current: LiveState = 'disconnected';
  private session: FeedSession | null = null;
  private last: number | null = null;

  constructor(private readonly opts: LiveSubscriberOptions) {}

  get state(): LiveState {
    return this.current;
  }

  get lastPrice(): number | null {
    return this.last;
  }

  /** Keeps a subscription alive until `stop` is raised. Never rejects. */
  async run(stop: StopSignal): Promise<void> {
    let attempts = 0;
    while (!stop.raised) {
      if (attempts++ > 0) liveReconnects.inc();
      try {
        await this.connectOnce(stop);
        if (!stop.raised) logger.warn({ symbol: this.opts.symbol }, 'live feed closed');
      } catch (e) {
        const fe = toFetchError(e);
        logger.warn({ symbol: this.opts.symbol, kind: fe.kind, err: fe.message }, 'live feed failed');
      } finally {
        this.session = null;
        this.setState('disconnected');
      }
      if (stop.raised) break;
      await stop.wait(this.opts.reconnectDelayMs ?? 5000);
    }
    logger.info('live subscriber stopped');
  }

  /** Drops the active connection; `run` then reconnects unless stopped. */
  close(): void {
    this.session?.close();
  }

  private async connectOnce(stop: StopSignal) {
    const { connector, symbol, token, requestTimeoutMs } = this.opts;

    this.setState('authorizing');
    const session = await connector();
    this.session = session;
    if (stop.raised) {
      session.close();
      return;
    }

    const unsubscribe = session.onMessage((msg) => this.handleMessage(msg));
    try {
      if (token) await session.request({ authorize: token }, requestTimeoutMs);
      await session.request({ ticks: symbol, subscribe: 1 }, requestTimeoutMs);
      this.setState('subscribed');
      logger.info({ symbol }, 'live feed subscribed');
      await session.closed;
    } finally {
      unsubscribe();
      session.close();
    }
  }

  private handleMessage(msg: FeedMessage) {
    const parsed = TickReply.safeParse(msg);
    if (!parsed.success) return;

    const tick = liveTick(parsed.data.tick.epoch, parsed.data.tick.quote);
    const inserted = this.opts.store.insertOne(tick);
    this.last = tick.price;

    liveTicks.inc();
    if (inserted) {
      ticksInserted.inc({ source: 'live' });
      tickStoreSize.set(this.opts.store.count());
    }
    this.opts.onTick?.(tick, inserted);
  }

  private setState(next: LiveState) {
    if (next === this.current) return;
    this.current = next;
    this.opts.onStateChange?.(next);
  }
}
