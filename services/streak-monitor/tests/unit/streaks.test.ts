import { describe, it, expect } from 'vitest';
import type { Candle, CandleColor } from '../../src/domain/types.js';
import { buildHistogram, emptyHistogram, scoreCandles, scoreHistogram, strength } from '../../src/analysis/streaks.js';

function candle(bucketStart: number, color: CandleColor): Candle {
  const open = 10;
  const close = color === 'Green' ? 11 : color === 'Red' ? 9 : 10;
  return { bucketStart, open, close, color };
}

function series(colors: CandleColor[], cycle = 60): Candle[] {
  return colors.map((c, i) => candle(i * cycle, c));
}

describe('buildHistogram', () => {
  it('closes a run on a time gap and starts a new one after it', () => {
    const candles = [0, 60, 120, 240].map((b) => candle(b, 'Green'));
    const hist = buildHistogram(candles, 60);

    expect([...hist.Green.entries()]).toEqual([[3, 1], [1, 1]]);
    expect(hist.Red.size).toBe(0);
  });

  it('ends a run on Gray without starting one', () => {
    const hist = buildHistogram(series(['Green', 'Green', 'Gray', 'Green']), 60);
    expect([...hist.Green.entries()]).toEqual([[2, 1], [1, 1]]);
  });

  it('starts a run of one on a colour change', () => {
    const hist = buildHistogram(series(['Green', 'Green', 'Red', 'Red', 'Red', 'Green']), 60);
    expect([...hist.Green.entries()]).toEqual([[2, 1], [1, 1]]);
    expect([...hist.Red.entries()]).toEqual([[3, 1]]);
  });

  it('counts repeated run lengths', () => {
    const hist = buildHistogram(series(['Red', 'Green', 'Red', 'Gray', 'Red']), 60);
    expect(hist.Red.get(1)).toBe(3);
    expect(hist.Green.get(1)).toBe(1);
  });

  it('returns empty maps for no candles', () => {
    const hist = buildHistogram([], 60);
    expect(hist.Green.size + hist.Red.size).toBe(0);
  });
});

describe('strength', () => {
  it('is the share of runs that stopped at this length', () => {
    expect(strength(10, 2)).toBe(80);
    expect(strength(4, 0)).toBe(100);
    expect(strength(3, 1)).toBeCloseTo(66.6667, 4);
  });
});

describe('scoreHistogram', () => {
  it('reports only levels whose strength is inside the bounds', () => {
    const hist = emptyHistogram();
    hist.Green.set(1, 4).set(2, 1);
    hist.Red.set(1, 2).set(2, 2);

    expect(scoreHistogram(hist, 'C60_00', { minStrength: 70, maxStrength: 100 })).toEqual([
      { tf: 'C60_00', color: 'Green', level: 1, curr: 4, next: 1, strength: 75 },
      { tf: 'C60_00', color: 'Green', level: 2, curr: 1, next: 0, strength: 100 },
      { tf: 'C60_00', color: 'Red', level: 2, curr: 2, next: 0, strength: 100 },
    ]);
  });

  it('applies both bounds inclusively', () => {
    const hist = emptyHistogram();
    hist.Green.set(1, 4).set(2, 1);

    expect(scoreHistogram(hist, 'C5_01', { minStrength: 75, maxStrength: 75 }).map((k) => k.level)).toEqual([1]);
  });
});

describe('scoreCandles', () => {
  const bounds = { minStrength: 0, maxStrength: 100, minCandles: 5 };

  it('skips timeframes with too few candles', () => {
    expect(scoreCandles(series(['Green', 'Green', 'Red', 'Red']), 60, 0, bounds)).toEqual([]);
  });

  it('labels candidates with the timeframe', () => {
    const kings = scoreCandles(series(['Green', 'Green', 'Red', 'Red', 'Red']), 60, 7, bounds);
    expect(kings).toEqual([
      { tf: 'C60_07', color: 'Green', level: 2, curr: 1, next: 0, strength: 100 },
      { tf: 'C60_07', color: 'Red', level: 3, curr: 1, next: 0, strength: 100 },
    ]);
  });
});
