const ABORT_ERROR_NAME = 'AbortError';

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === ABORT_ERROR_NAME;
}

function createAbortError(signal: AbortSignal): Error {
  if (signal.reason instanceof Error && signal.reason.name === ABORT_ERROR_NAME) {
    return signal.reason;
  }
  const error = new Error('Operation aborted');
  error.name = ABORT_ERROR_NAME;
  return error;
}

export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw createAbortError(signal);
  }
}

/**
 * Resolves after `ms`, or rejects with an AbortError as soon as `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(createAbortError(signal));
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      if (signal) {
        reject(createAbortError(signal));
      }
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Combines a per-call timeout with an optional caller signal. The timeout
 * aborts with a TimeoutError, which callers treat like any provider error.
 */
export function withTimeout(timeoutMs: number, signal?: AbortSignal): AbortSignal {
  const timeoutSignal = AbortSignal.timeout(timeoutMs);
  return signal ? AbortSignal.any([signal, timeoutSignal]) : timeoutSignal;
}
