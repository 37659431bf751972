import type { FeedMessage, FeedRequest } from './protocol.js';

/**
 * One open connection to the upstream feed. Replies are matched to requests by
 * `req_id`; every inbound message, matched or not, is also handed to `onMessage`
 * listeners (subscription streams arrive that way).
 */
export interface FeedSession {
  request(payload: FeedRequest, timeoutMs?: number): Promise<FeedMessage>;
  onMessage(handler: (msg: FeedMessage) => void): () => void;
  /** Resolves once the connection is gone, for whatever reason. */
  readonly closed: Promise<void>;
  close(): void;
}

export type FeedConnector = () => Promise<FeedSession>;
