import { AbortError } from '../error/abortError.js';
import { TimeoutError } from '../error/timeoutError.js';

/**
 * Signal plus the hook that detaches it from its timers and sources once the request is settled.
 */
export interface ScopedSignal {
  signal: AbortSignal;
  release: () => void;
}

/**
 * Creates an {@link AbortSignal} that will automatically abort after
 * the specified timeout with a {@link TimeoutError}.
 *
 * When `timeoutMs` is `false` or `0`, no timeout signal is created.
 *
 * @param timeoutMs - Timeout in milliseconds, or `false` to disable.
 * @returns A scoped signal whose `release` clears the pending timer, or `null`.
 */
export function createTimeoutSignal(timeoutMs?: number | false): ScopedSignal | null {
  if (!timeoutMs) {
    return null;
  }

  const controller = new AbortController();

  const timeout = setTimeout(
    () => controller.abort(new TimeoutError(`error request timed out after ${timeoutMs}ms`)),
    timeoutMs,
  );

  controller.signal.addEventListener('abort', () => clearTimeout(timeout), {
    once: true,
  });

  return { signal: controller.signal, release: () => clearTimeout(timeout) };
}

/**
 * Merges multiple {@link AbortSignal} instances into a single signal.
 *
 * Behavior:
 * - If no signals are provided, returns `null`.
 * - If a single signal is provided, it is returned as-is.
 * - If multiple signals are provided, a new `AbortController` is created
 *   and will abort when any of the source signals abort.
 * - Preserves the abort `reason` when available, otherwise
 *   aborts with an {@link AbortError}.
 *
 * `release` removes the listeners from the sources, so long-lived signals
 * (such as the client's own) do not accumulate one listener per request.
 *
 * @param signals - List of signals to merge (nullable/undefined allowed).
 */
export function mergeSignals(signals: Array<AbortSignal | null | undefined>): ScopedSignal | null {
  const active: AbortSignal[] = signals.filter((s): s is AbortSignal => s !== null && s !== undefined);

  if (active.length === 0) {
    return null;
  }

  if (active.length === 1) {
    return { signal: active[0], release: () => {} };
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
