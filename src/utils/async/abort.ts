/**
 * Abort-aware async helpers shared by the transport, sessions and orchestrator
 */

/**
 * Build the error a cancelled operation rejects with
 *
 * Keeps `signal.reason` when it is already an Error so callers can tell a
 * deadline abort from a caller abort.
 */
export function abortReason(signal: AbortSignal): Error {
  if (signal.reason instanceof Error) {
    return signal.reason;
  }
  const err = new Error(
    typeof signal.reason === "string" ? signal.reason : "The operation was aborted",
  );
  err.name = "AbortError";
  return err;
}

/**
 * Check whether an error came from an aborted signal or a fetch timeout
 */
export function isAbortError(error: unknown): boolean {
  return (
    error instanceof Error &&
    (error.name === "AbortError" || error.name === "TimeoutError")
  );
}

/**
 * Sleep for ms, rejecting early when the signal fires
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(abortReason(signal));
  }
  if (ms <= 0) {
    return Promise.resolve();
  }

  return new Promise((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      if (signal) reject(abortReason(signal));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Race a promise against a signal
 *
 * The original promise keeps running; its eventual rejection is observed so it
 * never surfaces as unhandled.
 */
export function abortable<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    promise.catch(() => undefined);
    return Promise.reject(abortReason(signal));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(abortReason(signal));
    signal.addEventListener("abort", onAbort, { once: true });

    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}

/**
 * Derive a signal that fires when the parent fires or after timeoutMs
 *
 * Returns a dispose function that clears the timer and detaches from the parent.
 */
export function linkedTimeoutSignal(
  timeoutMs: number,
  parent?: AbortSignal,
): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();

  const timer = setTimeout(() => {
    const err = new Error(`Request timed out after ${timeoutMs}ms`);
    err.name = "TimeoutError";
    controller.abort(err);
  }, timeoutMs);

  const onParentAbort = (): void => {
    if (parent) controller.abort(abortReason(parent));
  };

  if (parent) {
    if (parent.aborted) {
      onParentAbort();
    } else {
      parent.addEventListener("abort", onParentAbort, { once: true });
    }
  }

  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
    },
  };
}
