import { TimeoutError } from '../error/timeoutError.js';

/** Abort wiring of a single request. */
export interface RequestScope {
  /** Signal handed to `fetch`, or `undefined` when nothing can abort the request. */
  readonly signal: AbortSignal | undefined;
  /** Clears the timeout and detaches from the source signals. Safe to call more than once. */
  release(): void;
}

/**
 * Creates the abort signal of one request, aborting when any source signal aborts
 * (with that source's reason) or, when `timeoutMs` is set, after the timeout with a
 * {@link TimeoutError}.
 *
 * The timer and the listeners added to the sources live until {@link RequestScope.release}
 * is called or the request signal aborts, so long-lived sources such as the client's
 * dispose signal do not collect a listener per request.
 */
export function createRequestScope(
  sources: Array<AbortSignal | null | undefined>,
  timeoutMs?: number | false,
): RequestScope {
  const active = sources.filter((s): s is AbortSignal => s !== null && s !== undefined);
  if (active.length === 0 && !timeoutMs) {
    return { signal: undefined, release: () => undefined };
  }

  const controller = new AbortController();
  const cleanups: Array<() => void> = [];
  const release = () => {
    for (const cleanup of cleanups.splice(0)) {
      cleanup();
    }
  };

  for (const source of active) {
    if (source.aborted) {
      controller.abort(source.reason);
      release();
      return { signal: controller.signal, release };
    }

    const abort = () => controller.abort(source.reason);
    source.addEventListener('abort', abort, { once: true });
    cleanups.push(() => source.removeEventListener('abort', abort));
  }

  if (timeoutMs) {
    const timeout = setTimeout(() => controller.abort(new TimeoutError(timeoutMs)), timeoutMs);
    cleanups.push(() => clearTimeout(timeout));
  }

  controller.signal.addEventListener('abort', release, { once: true });
  return { signal: controller.signal, release };
}
