/**
 * Cancellation helpers for index service calls
 */

/** Error used when a signal is aborted without an Error reason */
export class OperationAbortedError extends Error {
  constructor(message = 'Operation aborted') {
    super(message);
    this.name = 'OperationAbortedError';
  }
}

function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new OperationAbortedError();
}

/**
 * A signal combining a caller's signal with a timeout. Call dispose once the
 * guarded operation has settled to detach from the caller's signal.
 */
export interface TimeoutScope {
  signal: AbortSignal | undefined;
  dispose(): void;
}

const noop = (): void => undefined;

/**
 * Combine a caller's signal with a timeout. The scope's signal is the
 * caller's signal unchanged when no timeout is set.
 */
export function withTimeout(signal: AbortSignal | undefined, timeoutMs: number | undefined): TimeoutScope {
  if (!timeoutMs) {
    return { signal, dispose: noop };
  }

  const timeout = AbortSignal.timeout(timeoutMs);
  if (!signal) {
    return { signal: timeout, dispose: noop };
  }

  const controller = new AbortController();
  if (signal.aborted) {
    controller.abort(signal.reason);
    return { signal: controller.signal, dispose: noop };
  }
  const onCallerAbort = () => controller.abort(signal.reason);
  const onTimeout = () => controller.abort(timeout.reason);
  signal.addEventListener('abort', onCallerAbort, { once: true });
  timeout.addEventListener('abort', onTimeout, { once: true });
  return {
    signal: controller.signal,
    dispose: () => {
      signal.removeEventListener('abort', onCallerAbort);
      timeout.removeEventListener('abort', onTimeout);
    }
  };
}

/**
 * Run an operation under the caller's signal and a timeout. The operation
 * receives the combined signal; no listener stays on the caller's signal
 * once the call has settled.
 */
export async function callWithTimeout<T>(
  operation: (signal: AbortSignal | undefined) => Promise<T>,
  signal: AbortSignal | undefined,
  timeoutMs: number | undefined
): Promise<T> {
  signal?.throwIfAborted();
  const scope = withTimeout(signal, timeoutMs);
  try {
    return await abortable(operation(scope.signal), scope.signal);
  } finally {
    scope.dispose();
  }
}

/**
 * Settle with the promise, or reject as soon as the signal aborts.
 * The underlying operation is not cancelled; its outcome is ignored.
 */
export function abortable<T>(promise: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
  if (!signal) {
    return promise;
  }
  if (signal.aborted) {
    // Observe the abandoned promise so its rejection is not reported as unhandled
    void promise.catch(() => undefined);
    return Promise.reject(abortReason(signal));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(abortReason(signal));
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
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
