// src/analysis/grid.ts
import { setImmediate as yieldToLoop } from 'node:timers/promises';
import type { AnalysisConfig, King, Tick } from '../domain/types.js';
import { aggregateCandles } from './candles.js';
import { scoreCandles } from './streaks.js';
import { foldKings, rankKings, type KingMap } from './kings.js';

export type GridOptions = {
  minCandles: number;
  /** Yield to the event loop after each cycle so ingestion keeps flowing. Default true. */
  yieldBetweenCycles?: boolean;
};

/**
 * Scans every (cycle, offset) pair, ascending cycle then ascending offset, and keeps
 * the strongest candidate per (color, level). Returns kings ranked by level, then colour.
 */
export async function scanGrid(
  ticks: readonly Tick[],
  config: AnalysisConfig,
  opts: GridOptions,
): Promise<King[]> {
  const { minCycle, maxCycle } = config;
  if (!Number.isInteger(minCycle) || !Number.isInteger(maxCycle) || minCycle < 1 || maxCycle < minCycle) {
    throw new Error(`invalid cycle range ${minCycle}..${maxCycle}`);
  }

  const kings: KingMap = new Map();
  if (!ticks.length) return [];

  const bounds = { minStrength: config.minStrength, maxStrength: config.maxStrength, minCandles: opts.minCandles };
  for (let cycle = minCycle; cycle <= maxCycle; cycle++) {
    for (let offset = 0; offset < cycle; offset++) {
      const candles = aggregateCandles(ticks, cycle, offset);
      foldKings(kings, scoreCandles(candles, cycle, offset, bounds));
    }
    if (opts.yieldBetweenCycles !== false) await yieldToLoop();
  }
  return rankKings(kings);
}
