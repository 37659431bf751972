// src/ingest/backfill.ts
import type { Tick } from '../domain/types.js';
import { batchTicks } from '../domain/ticks.js';
import type { TickStore } from '../store/tick-store.js';
import type { FeedConnector, FeedSession } from '../feed/session.js';
import { HistoryReply, historyRequest } from '../feed/protocol.js';
import { FetchError, toFetchError } from '../utils/errors.js';
import { err, ok, type Result } from '../utils/result.js';
import { runPool } from '../utils/pool.js';
import { logger } from '../utils/logger.js';
import { backfillChunks, ticksInserted, tickStoreSize } from '../metrics/metrics.js';

export const MAX_CHUNK_SEC = 600;

export type Chunk = { start: number; end: number }; // [start, end)

export type BackfillOptions = {
  connector: FeedConnector;
  store: TickStore;
  symbol: string;
  token: string;
  startTime: number;
  endTime: number;
  chunkSec?: number;
  concurrency?: number;
  timeoutMs?: number;
  onProgress?: (p: BackfillReport) => void;
};

export type BackfillReport = {
  chunks: number;
  succeeded: number;
  failed: number;
  inserted: number;
};

export function planChunks(start: number, end: number, chunkSec = MAX_CHUNK_SEC): Chunk[] {
  const width = Math.max(1, Math.min(Math.floor(chunkSec), MAX_CHUNK_SEC));
  const out: Chunk[] = [];
  for (let s = start; s < end; s += width) {
    out.push({ start: s, end: Math.min(s + width, end) });
  }
  return out;
}

export async function fetchChunk(
  connector: FeedConnector,
  symbol: string,
  token: string,
  chunk: Chunk,
  timeoutMs = 10_000,
): Promise<Result<Tick[], FetchError>> {
  const open: { session?: FeedSession; timer?: NodeJS.Timeout; settled?: boolean } = {};

  const deadline = new Promise<never>((_, reject) => {
    open.timer = setTimeout(
      () => reject(new FetchError('timeout', `chunk ${chunk.start}-${chunk.end} exceeded ${timeoutMs}ms`)),
      timeoutMs,
    );
  });

  const attempt = async (): Promise<Tick[]> => {
    const session = await connector();
    open.session = session;
    // deadline already fired
    if (open.settled) {
      session.close();
      return [];
    }
    if (token) await session.request({ authorize: token }, timeoutMs);
    const reply = await session.request(historyRequest(symbol, chunk.start, chunk.end), timeoutMs);

    const parsed = HistoryReply.safeParse(reply);
    if (!parsed.success) {
      throw new FetchError('protocol', `unexpected history reply: ${parsed.error.message}`);
    }
    const { times, prices } = parsed.data.history;
    return batchTicks(times, prices).filter((t) => t.timestamp >= chunk.start && t.timestamp < chunk.end);
  };

  try {
    return ok(await Promise.race([attempt(), deadline]));
  } catch (e) {
    return err(toFetchError(e));
  } finally {
    open.settled = true;
    clearTimeout(open.timer);
    open.session?.close();
  }
}

/**
 * Fills the store with history for [startTime, endTime). Chunks run through a bounded
 * pool; a failed chunk is logged and counted, never retried.
 */
export async function runBackfill(opts: BackfillOptions): Promise<BackfillReport> {
  const chunks = planChunks(opts.startTime, opts.endTime, opts.chunkSec);
  const report: BackfillReport = { chunks: chunks.length, succeeded: 0, failed: 0, inserted: 0 };
  if (!chunks.length) return report;

  logger.info(
    { symbol: opts.symbol, chunks: chunks.length, from: opts.startTime, to: opts.endTime },
    'backfill starting'
  );

  await runPool(
    chunks,
    opts.concurrency ?? 5,
    (chunk) => fetchChunk(opts.connector, opts.symbol, opts.token, chunk, opts.timeoutMs),
    (res, chunk) => {
      if (res.ok) {
        const n = opts.store.insertBatch(res.value);
        report.succeeded++;
        report.inserted += n;
        backfillChunks.inc({ result: 'ok' });
        ticksInserted.inc({ source: 'backfill' }, n);
        tickStoreSize.set(opts.store.count());
      } else {
        report.failed++;
        backfillChunks.inc({ result: res.error.kind });
        logger.warn({ chunk, kind: res.error.kind, err: res.error.message }, 'backfill chunk skipped');
      }
      opts.onProgress?.({ ...report });
    },
  );

  logger.info({ ...report, stored: opts.store.count() }, 'backfill finished');
  return report;
}
