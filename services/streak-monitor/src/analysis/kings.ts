import type { King, StreakColor } from '../domain/types.js';

export type KingMap = Map<string, King>;

export const kingKey = (color: StreakColor, level: number) => `${color}|${level}`;

// strictly greater replaces; on ties the first writer stays
export function foldKings(map: KingMap, candidates: readonly King[]): KingMap {
  for (const k of candidates) {
    const key = kingKey(k.color, k.level);
    const cur = map.get(key);
    if (!cur || k.strength > cur.strength) map.set(key, k);
  }
  return map;
}

export function rankKings(map: KingMap): King[] {
  return [...map.values()].sort(
    (a, b) => a.level - b.level || (a.color < b.color ? -1 : a.color > b.color ? 1 : 0)
  );
}
