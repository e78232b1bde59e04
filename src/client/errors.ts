import { errorCode, isRecord } from '../utils.js';

/** The endpoint could not be reached or answered with a failing status. */
export class TransportError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
    public readonly retryable = false
  ) {
    super(message);
    this.name = 'TransportError';
  }
}

/** The endpoint answered, but with a body that isn't a valid response. */
export class ProtocolError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ProtocolError';
  }
}

const RE_CONN_REFUSED = /ECONNREFUSED|fetch failed/i;

export function asError(e: unknown, fallback = 'unknown error'): Error {
  if (e instanceof Error) return e;
  if (e === undefined) return new Error(fallback);
  return new Error(String(e));
}

export function isConnRefused(e: unknown): boolean {
  if (!(e instanceof Error)) return false;
  const cause = isRecord(e.cause) ? e.cause : undefined;
  return errorCode(cause) === 'ECONNREFUSED' || errorCode(e) === 'ECONNREFUSED' || RE_CONN_REFUSED.test(e.message);
}

export function isAbortError(e: unknown): boolean {
  return e instanceof Error && (e.name === 'AbortError' || errorCode(e) === 'ABORT_ERR');
}

/** Tests shorten backoff through LATHE_TEST_RETRY_DELAY_MS. */
export function getRetryDelayMs(defaultMs: number): number {
  const raw = process.env.LATHE_TEST_RETRY_DELAY_MS;
  if (raw == null) return defaultMs;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed < 0) return defaultMs;
  return Math.floor(parsed);
}
