/**
 * Outcome of racing a promise against an abort signal.
 */
export type RaceOutcome<T> =
  | { readonly kind: 'settled'; readonly value: T }
  | { readonly kind: 'aborted'; readonly reason: unknown };

/**
 * Settle with the promise's value, or with `aborted` as soon as `signal`
 * fires. The promise itself keeps running; a rejection after the abort is
 * the caller's to observe.
 */
export function raceAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<RaceOutcome<T>> {
  if (!signal) {
    return promise.then((value): RaceOutcome<T> => ({ kind: 'settled', value }));
  }
  if (signal.aborted) {
    return Promise.resolve<RaceOutcome<T>>({ kind: 'aborted', reason: signal.reason });
  }

  return new Promise<RaceOutcome<T>>((resolve, reject) => {
    const onAbort = (): void => resolve({ kind: 'aborted', reason: signal.reason });
    signal.addEventListener('abort', onAbort, { once: true });

    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve({ kind: 'settled', value });
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}
