import { RunCancelledError } from "../errors";

export function toCancellation(signal: AbortSignal): RunCancelledError {
  return signal.reason instanceof RunCancelledError
    ? signal.reason
    : new RunCancelledError("aborted");
}

export function throwIfCancelled(signal: AbortSignal): void {
  if (signal.aborted) {
    throw toCancellation(signal);
  }
}

/**
 * Settles with `promise`, or rejects with the run's cancellation as soon as
 * `signal` aborts. The underlying work is not interrupted.
 */
export function raceWithAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(toCancellation(signal));
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener("abort", onAbort, { once: true });
    }

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
