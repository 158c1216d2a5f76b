import { log } from "./logger.js";

export class DeadlineExceeded extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Deadline of ${timeoutMs}ms exceeded`);
    this.name = "DeadlineExceeded";
  }
}

/**
 * Race `work` against a timer. The timer is cleared as soon as either side
 * settles. When `controller` is given it is aborted on expiry so the work can
 * stop early; the work's eventual result is ignored either way.
 */
export async function withTimeout<T>(
  work: Promise<T>,
  timeoutMs: number,
  controller?: AbortController,
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller?.abort(new DeadlineExceeded(timeoutMs));
      reject(new DeadlineExceeded(timeoutMs));
    }, timeoutMs);
  });
  try {
    return await Promise.race([work, deadline]);
  } finally {
    clearTimeout(timer);
  }
}

/** Abort controller that follows `parent` and can also be aborted on its own. */
export function linkedController(parent?: AbortSignal): AbortController {
  const controller = new AbortController();
  if (!parent) return controller;
  if (parent.aborted) {
    controller.abort(parent.reason);
    return controller;
  }
  parent.addEventListener("abort", () => controller.abort(parent.reason), { once: true });
  return controller;
}

/**
 * Settle with `work`, or reject with the signal's reason as soon as it aborts.
 * The work itself keeps running; its late outcome is dropped.
 */
export function abortable<T>(work: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return work;
  if (signal.aborted) {
    work.catch((err: unknown) => log.debug("Dropped outcome of aborted work", { error: String(err) }));
    return Promise.reject(signal.reason);
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      },
    );
  });
}

export function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

/**
 * Work a caller stopped waiting for but could not interrupt. The task manager
 * keeps a task's worker slot until everything added here has settled.
 */
export class InFlightWork {
  private pending = new Set<Promise<void>>();

  get size(): number {
    return this.pending.size;
  }

  add(work: Promise<unknown>): void {
    const settled: Promise<void> = work.then(
      () => undefined,
      (err: unknown) => log.debug("Dropped outcome of abandoned work", { error: String(err) }),
    ).then(() => {
      this.pending.delete(settled);
    });
    this.pending.add(settled);
  }

  /** Resolves once nothing is left running, including work added while waiting. */
  async settled(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }
}
