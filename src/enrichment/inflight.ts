import { LexiconError } from "../errors/index.js";

/**
 * Per-key mutual exclusion for async work. A second `run` for a key that is
 * still in flight gets the first caller's promise; the entry is removed when
 * that promise settles, whichever way it settles.
 */
export class InFlightRegistry<T> {
  private readonly entries = new Map<string, Promise<T>>();

  public has(key: string): boolean {
    return this.entries.has(key);
  }

  public size(): number {
    return this.entries.size;
  }

  public run(key: string, task: () => Promise<T>): Promise<T> {
    const existing = this.entries.get(key);
    if (existing) return existing;
    const promise: Promise<T> = Promise.resolve()
      .then(task)
      .finally(() => {
        if (this.entries.get(key) === promise) this.entries.delete(key);
      });
    this.entries.set(key, promise);
    return promise;
  }
}

export interface DeadlineOptions {
  /** Omitted: only the caller's signal ends the wait. */
  timeoutMs?: number;
  signal?: AbortSignal;
  label?: string;
}

/**
 * Runs `work` with an AbortSignal that fires on timeout or when the caller's
 * signal aborts. Only the wait is abandoned; `work` that ignores the signal
 * keeps running. Rejects with a TIMEOUT or CANCELLED LexiconError; timers and
 * listeners are released on every exit path.
 */
export async function withDeadline<T>(work: (signal: AbortSignal) => Promise<T>, options: DeadlineOptions): Promise<T> {
  const label = options.label ?? "operation";
  const cancelled = () => new LexiconError({ code: "CANCELLED", message: `${label} was cancelled`, retryable: true });
  if (options.signal?.aborted) throw cancelled();

  const controller = new AbortController();
  const handles: { timer?: NodeJS.Timeout; onAbort?: () => void } = {};
  const { timeoutMs } = options;
  const deadline = new Promise<never>((_, reject) => {
    if (timeoutMs !== undefined) {
      handles.timer = setTimeout(() => {
        const err = new LexiconError({
          code: "TIMEOUT",
          message: `${label} timed out after ${timeoutMs}ms`,
          retryable: true,
        });
        controller.abort(err);
        reject(err);
      }, Math.max(1, timeoutMs));
    }
    handles.onAbort = () => {
      const err = cancelled();
      controller.abort(err);
      reject(err);
    };
    options.signal?.addEventListener("abort", handles.onAbort, { once: true });
  });

  try {
    return await Promise.race([work(controller.signal), deadline]);
  } finally {
    clearTimeout(handles.timer);
    if (handles.onAbort) options.signal?.removeEventListener("abort", handles.onAbort);
  }
}
