/**
 * AbortSignal helpers
 *
 * Aborting only stops a caller from waiting. Work other callers share
 * (a render in flight, a diff being composed) runs to completion.
 */

/**
 * True for the rejection produced when a caller's AbortSignal fires
 */
export function isAbortError(value: unknown): value is Error {
  return value instanceof Error && value.name === 'AbortError';
}

export function createAbortError(signal: AbortSignal): Error {
  if (signal.reason instanceof Error) {
    return signal.reason;
  }
  const error = new Error('The operation was aborted');
  error.name = 'AbortError';
  return error;
}

/**
 * Resolve with `promise`, or reject early when `signal` aborts
 */
export function waitWithSignal<T>(promise: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
  if (!signal) {
    return promise;
  }
  if (signal.aborted) {
    // Keep a later rejection of the abandoned work from going unhandled
    void promise.catch(() => undefined);
    return Promise.reject(createAbortError(signal));
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(createAbortError(signal));
    signal.addEventListener('abort', onAbort, { once: true });
    void promise.then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}
