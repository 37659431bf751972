// src/feed/ws-client.ts
import WebSocket from 'ws';
import { logger } from '../utils/logger.js';
import { FetchError } from '../utils/errors.js';
import { ErrorReply, isFeedMessage, type FeedMessage, type FeedRequest } from './protocol.js';
import type { FeedConnector, FeedSession } from './session.js';

type Pending = {
  resolve: (msg: FeedMessage) => void;
  reject: (err: FetchError) => void;
  timer?: NodeJS.Timeout;
};

export class WsFeedSession implements FeedSession {
  readonly closed: Promise<void>;
  private nextReqId = 1;
  private readonly pending = new Map<number, Pending>();
  private readonly handlers = new Set<(msg: FeedMessage) => void>();

  private constructor(private readonly ws: WebSocket) {
    this.closed = new Promise<void>((resolve) => {
      ws.once('close', (code: number) => {
        this.failPending(new FetchError('connection', `feed connection closed (${code})`));
        this.handlers.clear();
        resolve();
      });
    });
    ws.on('message', (raw: WebSocket.RawData) => this.handleRaw(raw));
    // 'close' always follows; keep the socket from throwing on an unhandled 'error'
    ws.on('error', (err: Error) => logger.debug({ err }, 'feed socket error'));
  }

  static connect(url: string, timeoutMs: number): Promise<WsFeedSession> {
    return new Promise<WsFeedSession>((resolve, reject) => {
      const ws = new WebSocket(url, { handshakeTimeout: timeoutMs });
      const onError = (err: Error) => {
        ws.removeAllListeners();
        ws.on('error', () => undefined);
        ws.terminate();
        reject(new FetchError('connection', `feed connect failed: ${err.message}`, { cause: err }));
      };
      ws.once('error', onError);
      ws.once('open', () => {
        ws.off('error', onError);
        resolve(new WsFeedSession(ws));
      });
    });
  }

  request(payload: FeedRequest, timeoutMs?: number): Promise<FeedMessage> {
    if (this.ws.readyState !== WebSocket.OPEN) {
      return Promise.reject(new FetchError('connection', 'feed connection is not open'));
    }
    const reqId = this.nextReqId++;

    return new Promise<FeedMessage>((resolve, reject) => {
      const entry: Pending = { resolve, reject };
      if (timeoutMs !== undefined) {
        entry.timer = setTimeout(() => {
          this.pending.delete(reqId);
          reject(new FetchError('timeout', `no reply within ${timeoutMs}ms`));
        }, timeoutMs);
      }
      this.pending.set(reqId, entry);

      this.ws.send(JSON.stringify({ ...payload, req_id: reqId }), (err?: Error) => {
        if (!err) return;
        this.settle(reqId)?.reject(new FetchError('connection', err.message, { cause: err }));
      });
    });
  }

  onMessage(handler: (msg: FeedMessage) => void): () => void {
    this.handlers.add(handler);
    return () => this.handlers.delete(handler);
  }

  close(): void {
    if (this.ws.readyState === WebSocket.CLOSED) return;
    this.ws.close();
  }

  private handleRaw(raw: WebSocket.RawData) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw.toString());
    } catch {
      logger.debug('ignoring non-JSON feed message');
      return;
    }
    if (!isFeedMessage(parsed)) return;

    const reqId = parsed.req_id;
    if (typeof reqId === 'number') {
      const waiter = this.settle(reqId);
      if (waiter) {
        const failure = ErrorReply.safeParse(parsed);
        if (failure.success) {
          const { code, message } = failure.data.error;
          waiter.reject(new FetchError('upstream', code ? `${code}: ${message}` : message));
        } else {
          waiter.resolve(parsed);
        }
      }
    }

    for (const h of this.handlers) {
      try {
        h(parsed);
      } catch (err) {
        logger.error({ err }, 'feed message handler failed');
      }
    }
  }

  private settle(reqId: number): Pending | undefined {
    const entry = this.pending.get(reqId);
    if (!entry) return undefined;
    this.pending.delete(reqId);
    if (entry.timer) clearTimeout(entry.timer);
    return entry;
  }

  private failPending(err: FetchError) {
    for (const [reqId] of this.pending) this.settle(reqId)?.reject(err);
  }
}

export function wsConnector(url: string, timeoutMs: number): FeedConnector {
  return () => WsFeedSession.connect(url, timeoutMs);
}
