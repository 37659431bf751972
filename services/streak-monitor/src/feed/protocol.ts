import { z } from 'zod';

export type AuthorizeRequest = { authorize: string };
export type HistoryRequest = {
  ticks_history: string;
  start: number;
  end: number;
  count: number;
  style: 'ticks';
  adjust_start_time: 1;
};
export type SubscribeRequest = { ticks: string; subscribe: 1 };
export type FeedRequest = AuthorizeRequest | HistoryRequest | SubscribeRequest;

// anything the feed sends, before it is recognised
export type FeedMessage = Record<string, unknown>;

export const HISTORY_PAGE_SIZE = 5000;

export const ErrorReply = z.object({
  error: z.object({
    code: z.string().optional(),
    message: z.string(),
  }),
});

export const HistoryReply = z.object({
  msg_type: z.literal('history'),
  history: z.object({
    times: z.array(z.number().int()),
    prices: z.array(z.number().finite()),
  }),
});

export const TickReply = z.object({
  msg_type: z.literal('tick'),
  tick: z.object({
    epoch: z.number().int(),
    quote: z.number().finite(),
  }),
});

export function historyRequest(symbol: string, start: number, end: number): HistoryRequest {
  return {
    ticks_history: symbol,
    start,
    end,
    count: HISTORY_PAGE_SIZE,
    style: 'ticks',
    adjust_start_time: 1,
  };
}

export function isFeedMessage(v: unknown): v is FeedMessage {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}
