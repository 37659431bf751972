export type Tick = {
  timestamp: number; // epoch seconds
  price: number;
  sortKey: number;   // timestamp * SORT_KEY_SCALE + intra-second sequence
};

export type CandleColor = 'Red' | 'Green' | 'Gray';
export type StreakColor = Exclude<CandleColor, 'Gray'>;

export type Candle = {
  bucketStart: number; // epoch seconds, phase-shifted by the offset
  open: number;
  close: number;
  color: CandleColor;
};

// run length -> number of runs of exactly that length
export type StreakHistogram = Record<StreakColor, Map<number, number>>;

export type King = {
  tf: string;
  color: StreakColor;
  level: number;
  curr: number;
  next: number;
  strength: number;
};

export type AnalysisConfig = {
  symbol: string;
  minCycle: number;
  maxCycle: number;
  minStrength: number;
  maxStrength: number;
};

export type WireConfig = {
  symbol: string;
  min_cycle: number;
  max_cycle: number;
  min_strength: number;
  max_strength: number;
};

export type Snapshot = {
  status: string;
  last_update: string;
  price: number | null;
  kings: King[];
  config: WireConfig;
};

export type MonitorStatus = 'Initializing...' | 'Backfilling...' | 'Active' | 'Stopped';
