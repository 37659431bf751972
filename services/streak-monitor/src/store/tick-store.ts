// src/store/tick-store.ts
import type { Tick } from '../domain/types.js';
import { SORT_KEY_SCALE } from '../domain/ticks.js';

/**
 * In-memory tick history ordered by sort key.
 *
 * Every method is synchronous, so the backfill pool, the live subscriber and the
 * analysis loop can call it freely: the event loop serializes writes, and readers
 * receive copies that later inserts cannot change.
 */
export class TickStore {
  private ticks: Tick[] = [];
  private readonly keys = new Set<number>();

  insertBatch(batch: readonly Tick[]): number {
    const fresh: Tick[] = [];
    for (const t of batch) {
      if (this.keys.has(t.sortKey)) continue;
      this.keys.add(t.sortKey);
      fresh.push(t);
    }
    if (!fresh.length) return 0;

    fresh.sort((a, b) => a.sortKey - b.sortKey);
    const last = this.ticks[this.ticks.length - 1];
    if (!last || fresh[0].sortKey > last.sortKey) {
      this.ticks.push(...fresh);
    } else {
      this.ticks = mergeSorted(this.ticks, fresh);
    }
    return fresh.length;
  }

  insertOne(tick: Tick): boolean {
    if (this.keys.has(tick.sortKey)) return false;
    this.keys.add(tick.sortKey);

    const last = this.ticks[this.ticks.length - 1];
    if (!last || tick.sortKey > last.sortKey) {
      this.ticks.push(tick);
    } else {
      this.ticks.splice(lowerBound(this.ticks, tick.sortKey), 0, tick);
    }
    return true;
  }

  rangeSince(minTimestamp: number): Tick[] {
    return this.ticks.slice(lowerBound(this.ticks, minTimestamp * SORT_KEY_SCALE));
  }

  latestPrice(): number | null {
    const last = this.ticks[this.ticks.length - 1];
    return last ? last.price : null;
  }

  count(): number {
    return this.ticks.length;
  }
}

// first index whose sortKey >= key
function lowerBound(arr: readonly Tick[], key: number): number {
  let lo = 0;
  let hi = arr.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (arr[mid].sortKey < key) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}

function mergeSorted(a: readonly Tick[], b: readonly Tick[]): Tick[] {
  const out: Tick[] = new Array<Tick>(a.length + b.length);
  let i = 0, j = 0, k = 0;
  while (i < a.length && j < b.length) {
    out[k++] = a[i].sortKey <= b[j].sortKey ? a[i++] : b[j++];
  }
  while (i < a.length) out[k++] = a[i++];
  while (j < b.length) out[k++] = b[j++];
  return out;
}
