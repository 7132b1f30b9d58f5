import { isAbortError } from '@verita/shared/src/utils/async.js';

const BASE_DELAY_MS = 1000;

const TRANSIENT_PATTERNS = [
  '429',
  'rate limit',
  'too many requests',
  '500',
  '502',
  '503',
  'internal server error',
  'bad gateway',
  'service unavailable',
  'econnreset',
  'etimedout',
  'timeout',
  'network',
  'socket hang up',
  'econnrefused',
  'aborted',
];

function readStatusCode(error: Error): number | undefined {
  if ('status' in error && typeof error.status === 'number') {
    return error.status;
  }
  if ('statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  return undefined;
}

export function isTransientError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }

  // Callers rethrow their own aborts first, so an abort seen here came from
  // the per-call timeout.
  if (error.name === 'TimeoutError' || isAbortError(error)) {
    return true;
  }

  const statusCode = readStatusCode(error);
  if (typeof statusCode === 'number' && (statusCode === 429 || statusCode >= 500)) {
    return true;
  }

  const message = error.message.toLowerCase();
  return TRANSIENT_PATTERNS.some((pattern) => message.includes(pattern));
}

export function computeBackoffMs(attempt: number): number {
  const exponential = BASE_DELAY_MS * Math.pow(2, attempt);
  const jitter = Math.random() * BASE_DELAY_MS;
  return exponential + jitter;
}
