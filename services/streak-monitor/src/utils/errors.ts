export type FetchErrorKind = 'timeout' | 'connection' | 'upstream' | 'protocol';

/** Failure talking to the upstream feed. `upstream` means the feed answered with an error reply. */
export class FetchError extends Error {
  readonly kind: FetchErrorKind;

  constructor(kind: FetchErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FetchError';
    this.kind = kind;
  }
}

export function toFetchError(e: unknown): FetchError {
  if (e instanceof FetchError) return e;
  const message = e instanceof Error ? e.message : String(e);
  return new FetchError('connection', message, { cause: e });
}
