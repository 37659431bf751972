import type { Tick } from './types.js';

export const SORT_KEY_SCALE = 100_000;

export function liveTick(timestamp: number, price: number): Tick {
  return { timestamp, price, sortKey: timestamp * SORT_KEY_SCALE };
}

/**
 * Builds ticks from parallel epoch/price arrays as returned by a history request.
 * Ticks sharing a timestamp get increasing sequence numbers in arrival order, so the
 * first tick of every second lands on the same key a live tick for that second would.
 */
export function batchTicks(times: readonly number[], prices: readonly number[]): Tick[] {
  const n = Math.min(times.length, prices.length);
  const out: Tick[] = [];
  let lastTs = Number.NaN;
  let seq = 0;
  for (let i = 0; i < n; i++) {
    const ts = Math.floor(times[i]);
    const price = prices[i];
    if (!Number.isFinite(ts) || !Number.isFinite(price)) continue;
    seq = ts === lastTs ? seq + 1 : 0;
    lastTs = ts;
    if (seq >= SORT_KEY_SCALE) continue;
    out.push({ timestamp: ts, price, sortKey: ts * SORT_KEY_SCALE + seq });
  }
  return out;
}
