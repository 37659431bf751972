import { describe, it, expect, vi } from 'vitest';
import { StreakMonitor, type MonitorSettings } from '../../src/monitor.js';
import type { FeedRequest } from '../../src/feed/protocol.js';
import { FakeFeed, historyMessage, tickMessage, type Reply } from './helpers/fake-feed.js';

const NOW = 10000;

const settings: MonitorSettings = {
  token: '',
  analysis: {
    symbol: 'R_100',
    minCycle: 60,
    maxCycle: 61,
    minStrength: 70,
    maxStrength: 100,
    windowSec: 600,
    intervalMs: 60000,
    minCandles: 5,
  },
  backfill: { hours: 1, chunkSec: 600, concurrency: 3 },
  timeoutMs: 1000,
  reconnectDelayMs: 5,
};

// a tick every 10s across each chunk, plus one on the exclusive end; the chunk at 7600 is a gap
function feed(req: FeedRequest): Reply {
  if ('ticks_history' in req) {
    if (req.start === 7600) return historyMessage([], []);
    const times: number[] = [];
    for (let t = req.start; t < req.end; t += 10) times.push(t);
    times.push(req.end);
    return historyMessage(times, times.map((t) => 100 + ((t / 10) % 7)));
  }
  if ('ticks' in req) return tickMessage(NOW, 5);
  return null;
}

describe('StreakMonitor', () => {
  it('backfills, follows the live feed and publishes analysis until stopped', async () => {
    const fake = new FakeFeed(feed);
    const monitor = new StreakMonitor(fake.connector, settings, () => NOW);
    const statuses: string[] = [];
    monitor.hub.subscribe((s) => statuses.push(s.status));

    expect(monitor.ready).toBe(false);
    const report = await monitor.start();

    expect(report).toEqual({ chunks: 6, succeeded: 6, failed: 0, inserted: 300 });
    expect(monitor.ready).toBe(true);
    expect(monitor.hub.current().status).toBe('Active');

    await vi.waitFor(() => expect(monitor.subscriber.state).toBe('subscribed'));
    const live = fake.last();
    expect(monitor.store.count()).toBe(301);

    // second already backfilled: the stored tick wins
    live?.emit(tickMessage(9400, 50));
    expect(monitor.store.count()).toBe(301);
    expect(monitor.store.rangeSince(9400)[0]).toMatchObject({ timestamp: 9400, price: 102 });

    live?.emit(tickMessage(NOW + 1, 6));
    live?.emit(tickMessage(NOW + 2, 7));
    live?.emit(tickMessage(NOW + 2, 8));

    expect(monitor.store.count()).toBe(303);
    expect(monitor.store.rangeSince(NOW).map((t) => [t.timestamp, t.price])).toEqual([
      [NOW, 5],
      [NOW + 1, 6],
      [NOW + 2, 7],
    ]);

    const kings = await monitor.scheduler.runPass();
    const snap = monitor.hub.current();
    expect(snap.price).toBe(8);
    expect(snap.kings).toEqual(kings);
    for (const k of kings) {
      expect(k.tf).toMatch(/^C6[01]_\d\d$/);
      expect(k.strength).toBeGreaterThanOrEqual(70);
      expect(k.strength).toBeLessThanOrEqual(100);
    }

    await monitor.stop();

    expect(monitor.stopped).toBe(true);
    expect(monitor.hub.current().status).toBe('Stopped');
    expect(live?.isOpen).toBe(false);
    expect(statuses.slice(0, 2)).toEqual(['Backfilling...', 'Active']);
    expect(statuses[statuses.length - 1]).toBe('Stopped');
  });

  it('stops cleanly before it was started', async () => {
    const monitor = new StreakMonitor(new FakeFeed(feed).connector, settings, () => NOW);
    await monitor.stop();
    expect(monitor.hub.current().status).toBe('Stopped');
  });
});
