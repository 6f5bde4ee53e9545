import { AbortError } from '../error/abortError.js';
import { TimeoutError } from '../error/timeoutError.js';

/** A signal paired with the function that releases what keeps it alive. */
export interface DisposableSignal {
  signal: AbortSignal;
  /** Clears timers or listeners; the signal stays in whatever state it reached. */
  release: () => void;
}

/**
 * Creates an {@link AbortSignal} that aborts with a {@link TimeoutError} once `timeoutMs` elapses.
 *
 * When `timeoutMs` is `false` or `0`, no timeout signal is created.
 */
export function createTimeoutSignal(timeoutMs?: number | false): DisposableSignal | null {
  if (!timeoutMs) {
    return null;
  }

  const controller = new AbortController();
  const timer = setTimeout(
    () => controller.abort(new TimeoutError(`error request timed out after ${timeoutMs}ms`)),
    timeoutMs,
  );

  return {
    signal: controller.signal,
    release: () => clearTimeout(timer),
  };
}

/**
 * Merges several {@link AbortSignal}s into one that aborts as soon as any source does.
 *
 * - No signals: `null`.
 * - One signal: returned as-is.
 * - Several: a new signal, aborted with the reason of the first source to abort
 *   (an {@link AbortError} when the source has none).
 *
 * Listeners on long-lived sources are removed on `release`, or once the merged signal aborts.
 */
export function mergeSignals(signals: Array<AbortSignal | null | undefined>): DisposableSignal | null {
  const active = signals.filter((s): s is AbortSignal => s !== null && s !== undefined);

  if (active.length === 0) {
    return null;
  }

  const [first] = active;
  if (active.length === 1 && first) {
    return { signal: first, release: () => {} };
  }

  const controller = new AbortController();
  const listeners: Array<() => void> = [];
  const release = () => {
    for (const remove of listeners.splice(0)) {
      remove();
    }
  };
  const abortFrom = (source: AbortSignal) => {
    controller.abort(source.reason ?? new AbortError('error signal triggered with unknown reason'));
  };

  controller.signal.addEventListener('abort', release, { once: true });

  for (const signal of active) {
    if (signal.aborted) {
      abortFrom(signal);
      break;
    }

    const abort = () => abortFrom(signal);
    signal.addEventListener('abort', abort, { once: true });
    listeners.push(() => signal.removeEventListener('abort', abort));
  }

  return { signal: controller.signal, release };
}
