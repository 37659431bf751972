// src/analysis/streaks.ts
import type { Candle, King, StreakColor, StreakHistogram } from '../domain/types.js';
import { timeframeLabel } from './candles.js';

export type StrengthBounds = {
  minStrength: number;
  maxStrength: number;
  minCandles: number;
};

export const STREAK_COLORS: readonly StreakColor[] = ['Green', 'Red'];

export function emptyHistogram(): StreakHistogram {
  return { Green: new Map(), Red: new Map() };
}

/**
 * Counts maximal runs per colour. A Gray candle ends the run and opens nothing; a time
 * gap wider than one cycle ends the run, and the candle after the gap opens a new one
 * when it is coloured.
 */
export function buildHistogram(candles: readonly Candle[], cycle: number): StreakHistogram {
  const hist = emptyHistogram();
  let runColor: StreakColor | null = null;
  let runLength = 0;
  let prevBucket: number | null = null;

  const closeRun = () => {
    if (runColor && runLength > 0) {
      const m = hist[runColor];
      m.set(runLength, (m.get(runLength) ?? 0) + 1);
    }
    runColor = null;
    runLength = 0;
  };

  for (const c of candles) {
    if (prevBucket !== null && c.bucketStart - prevBucket > cycle) closeRun();
    prevBucket = c.bucketStart;

    if (c.color === 'Gray') {
      closeRun();
    } else if (c.color === runColor) {
      runLength++;
    } else {
      closeRun();
      runColor = c.color;
      runLength = 1;
    }
  }
  closeRun();

  return hist;
}

/** Share of runs of length L that did not reach L+1, in percent. */
export function strength(count: number, next: number): number {
  return (1 - next / count) * 100;
}

export function scoreHistogram(
  hist: StreakHistogram,
  tf: string,
  bounds: Pick<StrengthBounds, 'minStrength' | 'maxStrength'>,
): King[] {
  const out: King[] = [];
  for (const color of STREAK_COLORS) {
    const m = hist[color];
    const levels = [...m.keys()].sort((a, b) => a - b);
    for (const level of levels) {
      const curr = m.get(level) ?? 0;
      if (curr <= 0) continue;
      const next = m.get(level + 1) ?? 0;
      const s = strength(curr, next);
      if (s < bounds.minStrength || s > bounds.maxStrength) continue;
      out.push({ tf, color, level, curr, next, strength: s });
    }
  }
  return out;
}

export function scoreCandles(
  candles: readonly Candle[],
  cycle: number,
  offset: number,
  bounds: StrengthBounds,
): King[] {
  if (candles.length < bounds.minCandles) return [];
  return scoreHistogram(buildHistogram(candles, cycle), timeframeLabel(cycle, offset), bounds);
}
