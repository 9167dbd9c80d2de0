import { OperationCanceledError } from "../contracts/MediatorExceptions";

/**
 * A signal derived from a caller's signal and an optional time limit.
 * dispose() detaches it from the caller's signal once the dispatch is over.
 */
export interface LinkedCancellation {
  readonly signal?: AbortSignal;
  dispose(): void;
}

const noop = (): void => {};

/**
 * Combines the caller's signal with a timeout. Whichever aborts first wins,
 * and its reason is kept.
 * @param cancellation The caller's signal, if any
 * @param timeoutMs The time limit, if any
 */
export function linkCancellation(cancellation?: AbortSignal, timeoutMs?: number): LinkedCancellation {
  if (timeoutMs === undefined) {
    return { signal: cancellation, dispose: noop };
  }

  const timeout = AbortSignal.timeout(timeoutMs);
  if (!cancellation) {
    return { signal: timeout, dispose: noop };
  }

  const controller = new AbortController();
  const sources = [cancellation, timeout];
  const listeners = sources.map((source) => {
    const listener = () => controller.abort(source.reason);
    return { source, listener };
  });
  const dispose = () => {
    for (const { source, listener } of listeners) {
      source.removeEventListener("abort", listener);
    }
  };

  const alreadyAborted = sources.find((source) => source.aborted);
  if (alreadyAborted) {
    controller.abort(alreadyAborted.reason);
    return { signal: controller.signal, dispose: noop };
  }

  for (const { source, listener } of listeners) {
    source.addEventListener("abort", listener, { once: true });
  }
  return { signal: controller.signal, dispose };
}

/**
 * Throws OperationCanceledError if the signal has already been aborted.
 */
export function throwIfCanceled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new OperationCanceledError(signal.reason);
  }
}

/**
 * Waits for work unless the signal aborts first. On abort the returned promise
 * rejects with OperationCanceledError while the work keeps running; it is handed
 * to onAbandoned so its outcome is still observed.
 * @param work The work being awaited
 * @param signal The signal to watch
 * @param onAbandoned Receives the work if the caller stopped waiting for it
 */
export function awaitWithCancellation<T>(
  work: Promise<T>,
  signal: AbortSignal | undefined,
  onAbandoned: (work: Promise<T>) => void
): Promise<T> {
  if (!signal) {
    return work;
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      onAbandoned(work);
      reject(new OperationCanceledError(signal.reason));
    };

    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener("abort", onAbort, { once: true });
    }

    work.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
}
