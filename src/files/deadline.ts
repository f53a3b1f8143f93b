import { BackingStoreError } from './file-errors';

/**
 * Signal that fires when either `timeoutMs` elapses or `parent` aborts,
 * whichever comes first.
 */
export function deadlineSignal(timeoutMs: number, parent?: AbortSignal): AbortSignal {
  const timeout = AbortSignal.timeout(timeoutMs);
  return parent ? AbortSignal.any([parent, timeout]) : timeout;
}

/**
 * Settles with the result of `work`, unless `signal` aborts first, in which
 * case it rejects with a {@link BackingStoreError} describing the operation.
 * `work` is not started at all once `signal` has aborted.
 */
export function withDeadline<T>(operation: string, signal: AbortSignal, work: () => Promise<T>): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(abortError(operation, signal));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(abortError(operation, signal));
    signal.addEventListener('abort', onAbort, { once: true });

    work().then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      }
    );
  });
}

function abortError(operation: string, signal: AbortSignal): BackingStoreError {
  const reason: unknown = signal.reason;
  const timedOut =
    typeof reason === 'object' && reason !== null && 'name' in reason && reason.name === 'TimeoutError';
  return new BackingStoreError(
    timedOut ? `Storage ${operation} timed out` : `Storage ${operation} was cancelled`,
    reason
  );
}
