import { FetchError } from '../../../src/utils/errors.js';
import type { FeedMessage, FeedRequest } from '../../../src/feed/protocol.js';
import type { FeedConnector, FeedSession } from '../../../src/feed/session.js';

// null: the feed never answers this request
export type Reply = FeedMessage | null;
export type Responder = (req: FeedRequest, session: FakeSession) => Reply;

/** In-process stand-in for one feed connection. */
export class FakeSession implements FeedSession {
  readonly requests: FeedRequest[] = [];
  private readonly handlers = new Set<(msg: FeedMessage) => void>();
  private readonly waiting = new Set<(e: FetchError) => void>();
  private finish: () => void = () => undefined;
  readonly closed = new Promise<void>((resolve) => {
    this.finish = resolve;
  });
  private open = true;

  constructor(private readonly respond: Responder, private readonly delayMs = 0) {}

  get isOpen(): boolean {
    return this.open;
  }

  request(payload: FeedRequest, timeoutMs?: number): Promise<FeedMessage> {
    if (!this.open) return Promise.reject(new FetchError('connection', 'closed'));
    this.requests.push(payload);

    return new Promise<FeedMessage>((resolve, reject) => {
      let timer: NodeJS.Timeout | undefined;
      const fail = (e: FetchError) => {
        clearTimeout(timer);
        this.waiting.delete(fail);
        reject(e);
      };
      this.waiting.add(fail);
      if (timeoutMs !== undefined) {
        timer = setTimeout(() => fail(new FetchError('timeout', 'timeout')), timeoutMs);
      }

      const reply = this.respond(payload, this);
      if (reply === null) return;
      setTimeout(() => {
        if (!this.open) return;
        clearTimeout(timer);
        this.waiting.delete(fail);
        this.emit(reply);
        if ('error' in reply) reject(new FetchError('upstream', 'upstream error'));
        else resolve(reply);
      }, this.delayMs);
    });
  }

  onMessage(handler: (msg: FeedMessage) => void): () => void {
    this.handlers.add(handler);
    return () => this.handlers.delete(handler);
  }

  /** Server push. */
  emit(msg: FeedMessage) {
    for (const h of [...this.handlers]) h(msg);
  }

  close(): void {
    if (!this.open) return;
    this.open = false;
    for (const fail of [...this.waiting]) fail(new FetchError('connection', 'closed'));
    this.handlers.clear();
    this.finish();
  }
}

export class FakeFeed {
  readonly sessions: FakeSession[] = [];
  failNext = 0;
  active = 0;
  maxActive = 0;

  constructor(private readonly respond: Responder, private readonly delayMs = 0) {}

  readonly connector: FeedConnector = async () => {
    if (this.failNext > 0) {
      this.failNext--;
      throw new FetchError('connection', 'connect refused');
    }
    const s = new FakeSession(this.respond, this.delayMs);
    this.sessions.push(s);
    this.active++;
    this.maxActive = Math.max(this.maxActive, this.active);
    void s.closed.then(() => {
      this.active--;
    });
    return s;
  };

  last(): FakeSession | undefined {
    return this.sessions[this.sessions.length - 1];
  }
}

export function tickMessage(epoch: number, quote: number): FeedMessage {
  return { msg_type: 'tick', tick: { epoch, quote } };
}

export function historyMessage(times: number[], prices: number[]): FeedMessage {
  return { msg_type: 'history', history: { times, prices } };
}
