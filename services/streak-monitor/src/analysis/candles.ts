// src/analysis/candles.ts
import type { Candle, CandleColor, Tick } from '../domain/types.js';

export function bucketStart(tsSec: number, cycle: number, offset: number): number {
  return Math.floor((tsSec - offset) / cycle) * cycle + offset;
}

export function candleColor(open: number, close: number): CandleColor {
  if (close > open) return 'Green';
  if (close < open) return 'Red';
  return 'Gray';
}

export function timeframeLabel(cycle: number, offset: number): string {
  return `C${cycle}_${String(offset).padStart(2, '0')}`;
}

/**
 * Folds ticks (ascending sort key) into phase-shifted candles. Buckets without ticks
 * produce no candle.
 */
export function aggregateCandles(ticks: readonly Tick[], cycle: number, offset: number): Candle[] {
  const out: Candle[] = [];
  let cur: { bucketStart: number; open: number; close: number } | null = null;

  for (const t of ticks) {
    const b = bucketStart(t.timestamp, cycle, offset);
    if (!cur || cur.bucketStart !== b) {
      if (cur) out.push({ ...cur, color: candleColor(cur.open, cur.close) });
      cur = { bucketStart: b, open: t.price, close: t.price };
    } else {
      cur.close = t.price;
    }
  }
  if (cur) out.push({ ...cur, color: candleColor(cur.open, cur.close) });

  return out;
}
