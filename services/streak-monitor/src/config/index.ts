// src/config/index.ts
import { z } from 'zod';

const Env = z.object({
  NODE_ENV: z.enum(['development','test','production']).default('development'),
  PORT: z.coerce.number().int().nonnegative().default(10000),

  LOG_LEVEL: z.enum(['fatal','error','warn','info','debug','trace','silent']).default('info'),
  LOG_PRETTY: z.union([z.literal('1'), z.literal('0')]).default('1'),
  CORS_ALLOW_ORIGINS: z.string().optional(),

  // upstream feed
  FEED_URL: z.string().url().default('wss://ws.derivws.com/websockets/v3'),
  FEED_APP_ID: z.string().default('1089'),
  FEED_TOKEN: z.string().default(''),
  SYMBOL: z.string().min(1).default('R_100'),

  // initial analysis bounds (mutable at runtime via POST /api/config)
  MIN_CYCLE: z.coerce.number().int().positive().default(60),
  MAX_CYCLE: z.coerce.number().int().positive().default(300),
  MIN_STRENGTH: z.coerce.number().default(70),
  MAX_STRENGTH: z.coerce.number().default(100),

  // backfill
  BACKFILL_HOURS: z.coerce.number().nonnegative().default(48),
  BACKFILL_CHUNK_SEC: z.coerce.number().int().positive().default(600),
  BACKFILL_CONCURRENCY: z.coerce.number().int().positive().default(5),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),

  // live + analysis loops
  RECONNECT_DELAY_MS: z.coerce.number().int().nonnegative().default(5000),
  ANALYSIS_WINDOW_SEC: z.coerce.number().int().positive().default(4 * 3600),
  ANALYSIS_INTERVAL_MS: z.coerce.number().int().positive().default(30000),
  MIN_CANDLES: z.coerce.number().int().positive().default(5),

  // optional snapshot fan-out
  REDIS_URL: z.string().optional(),
  PUBSUB_CHANNEL: z.string().default('ch:kings'),
});

const parsed = Env.safeParse(process.env);
if (!parsed.success) {
  console.error('Invalid environment:', parsed.error.flatten());
  process.exit(1);
}
const e = parsed.data;

function parseOrigins(value?: string): '*' | string[] | undefined {
  if (!value) return undefined;
  if (value.trim() === '*') return '*';
  const list = value
    .split(',')
    .map((part) => part.trim())
    .filter(Boolean);
  return list.length ? list : undefined;
}

function feedUrl(base: string, appId: string): string {
  const u = new URL(base);
  if (appId && !u.searchParams.has('app_id')) u.searchParams.set('app_id', appId);
  return u.toString();
}

export const cfg = {
  env: e.NODE_ENV,
  port: e.PORT,

  logLevel: e.LOG_LEVEL,
  logPretty: e.LOG_PRETTY === '1',
  cors: {
    origins: parseOrigins(e.CORS_ALLOW_ORIGINS),
  },

  feed: {
    url: feedUrl(e.FEED_URL, e.FEED_APP_ID),
    token: e.FEED_TOKEN,
    timeoutMs: e.FETCH_TIMEOUT_MS,
    reconnectDelayMs: e.RECONNECT_DELAY_MS,
  },

  analysis: {
    symbol: e.SYMBOL,
    minCycle: e.MIN_CYCLE,
    maxCycle: e.MAX_CYCLE,
    minStrength: e.MIN_STRENGTH,
    maxStrength: e.MAX_STRENGTH,
    windowSec: e.ANALYSIS_WINDOW_SEC,
    intervalMs: e.ANALYSIS_INTERVAL_MS,
    minCandles: e.MIN_CANDLES,
  },

  backfill: {
    hours: e.BACKFILL_HOURS,
    chunkSec: e.BACKFILL_CHUNK_SEC,
    concurrency: e.BACKFILL_CONCURRENCY,
  },

  redisUrl: e.REDIS_URL,
  pubsubChannel: e.PUBSUB_CHANNEL,
} as const;
