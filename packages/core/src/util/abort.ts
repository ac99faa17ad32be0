/**
 * AbortSignal helpers for per-call timeouts and pipeline deadlines.
 */

/** Combine the defined signals; aborts as soon as any of them does. */
export function combineSignals(...signals: Array<AbortSignal | undefined>): AbortSignal | undefined {
  const defined = signals.filter((s): s is AbortSignal => s !== undefined);
  if (defined.length === 0) return undefined;
  if (defined.length === 1) return defined[0];
  return AbortSignal.any(defined);
}

/** `AbortSignal.timeout` that accepts "no timeout" (undefined or <= 0). */
export function timeoutSignal(ms: number | undefined): AbortSignal | undefined {
  return ms !== undefined && ms > 0 ? AbortSignal.timeout(ms) : undefined;
}

export function abortMessage(signal: AbortSignal): string {
  const reason: unknown = signal.reason;
  if (reason instanceof Error) {
    return reason.name === 'TimeoutError' ? 'Operation timed out' : reason.message;
  }
  return reason === undefined ? 'Operation aborted' : String(reason);
}

/** Stops the work behind a raced promise; `onError` hears about failed cancels. */
export interface CancelHook {
  cancel(): Promise<unknown> | void;
  onError(err: unknown): void;
}

/**
 * Settle with the promise, or reject once the signal aborts. On abort the
 * hook cancels the underlying work (e.g. a running job).
 */
export function raceWithSignal<T>(
  promise: Promise<T>,
  signal: AbortSignal | undefined,
  hook?: CancelHook,
): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) {
    return Promise.reject(new Error(abortMessage(signal)));
  }

  return new Promise<T>((resolve, reject) => {
    const handleAbort = (): void => {
      reject(new Error(abortMessage(signal)));
      if (hook) {
        Promise.resolve()
          .then(() => hook.cancel())
          .catch((err: unknown) => hook.onError(err));
      }
    };
    signal.addEventListener('abort', handleAbort, { once: true });

    promise.then(
      (value) => {
        signal.removeEventListener('abort', handleAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', handleAbort);
        reject(err);
      },
    );
  });
}
