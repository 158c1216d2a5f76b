import { randomUUID } from "node:crypto";
import { getConfig } from "../config.js";
import {
  CancelledError,
  fromTaskError,
  SwitchyardError,
  type TaskError,
  TaskNotFound,
  TimeoutError,
  toTaskError,
  UnknownTaskKind,
} from "../errors.js";
import { log as rootLog } from "../utils/logger.js";
import { InFlightWork } from "../utils/timeout.js";
import { TaskQueue } from "./queue.js";
import {
  type CancelOutcome,
  canTransition,
  isTerminal,
  type TaskKindSource,
  type TaskSnapshot,
  type TaskStats,
  type TaskStatus,
  type TaskStore,
} from "./types.js";

const log = rootLog.child("tasks");

type TaskRecord = TaskSnapshot & {
  seq: number;
  controller?: AbortController;
  settle: () => void;
  settled: Promise<void>;
};

export type TaskManagerOptions = {
  kinds: TaskKindSource;
  /** Size of the worker pool; match it to what the backends can actually serve. */
  maxWorkers?: number;
  store?: TaskStore;
  now?: () => number;
};

export type TaskListener = (task: TaskSnapshot) => void;

export type ListOptions = {
  status?: TaskStatus;
  limit?: number;
};

/**
 * Runs submitted work on a bounded pool in FIFO order and tracks every task
 * from `pending` to exactly one terminal status. It is the only writer of a
 * task's status, result and error.
 */
export class TaskManager {
  readonly maxWorkers: number;
  private kinds: TaskKindSource;
  private store?: TaskStore;
  private now: () => number;
  private tasks = new Map<string, TaskRecord>();
  private queue = new TaskQueue<TaskRecord>();
  private active = 0;
  private seq = 0;
  private pumpScheduled = false;
  private closed = false;
  private reaper?: ReturnType<typeof setInterval>;
  private listeners = new Set<TaskListener>();

  constructor(opts: TaskManagerOptions) {
    this.kinds = opts.kinds;
    this.store = opts.store;
    this.now = opts.now ?? Date.now;
    this.maxWorkers = opts.maxWorkers ?? getConfig().workers.maxWorkers;
    if (!Number.isInteger(this.maxWorkers) || this.maxWorkers < 1) {
      throw new SwitchyardError("ConfigurationError", `maxWorkers must be a positive integer, got ${this.maxWorkers}`);
    }
  }

  /** Queue `kind` with `payload`. The task starts `pending`. */
  submit(kind: string, payload: unknown): string {
    if (this.closed) {
      throw new SwitchyardError("ConfigurationError", "Task manager is shut down");
    }
    if (!this.kinds.runnerFor(kind)) {
      throw new UnknownTaskKind(kind);
    }

    let settle: () => void = () => undefined;
    const settled = new Promise<void>((resolve) => {
      settle = resolve;
    });
    const task: TaskRecord = {
      id: randomUUID(),
      kind,
      payload: detach(payload),
      status: "pending",
      createdAt: this.now(),
      seq: ++this.seq,
      settle,
      settled,
    };
    this.tasks.set(task.id, task);
    this.queue.enqueue(task);
    this.record(task);
    log.debug("Task submitted", { taskId: task.id, kind, queueDepth: this.queue.length });

    this.schedulePump();
    return task.id;
  }

  getStatus(taskId: string): TaskSnapshot {
    const task = this.tasks.get(taskId);
    if (task) return snapshot(task);

    const stored = this.loadFromStore(taskId);
    if (stored) return stored;
    throw new TaskNotFound(taskId);
  }

  /**
   * Pending tasks are cancelled on the spot and never run. Running tasks are
   * asked to stop; they turn `cancelled` at the next boundary. Terminal tasks
   * are left alone.
   */
  cancel(taskId: string): CancelOutcome {
    const task = this.tasks.get(taskId);
    if (!task) {
      const stored = this.loadFromStore(taskId);
      if (stored) return { taskId, status: stored.status, cancelled: false };
      throw new TaskNotFound(taskId);
    }

    if (isTerminal(task.status)) {
      return { taskId, status: task.status, cancelled: false };
    }

    if (task.status === "pending") {
      this.finish(task, "cancelled", { error: new CancelledError(`Task "${taskId}"`).toJSON() });
      log.info("Cancelled pending task", { taskId });
      return { taskId, status: task.status, cancelled: true };
    }

    task.controller?.abort(new CancelledError(`Task "${taskId}"`));
    log.info("Cancellation requested for running task", { taskId });
    return { taskId, status: task.status, cancelled: true };
  }

  /** Resolve with the task's terminal snapshot, or throw `Timeout` after `timeoutMs`. */
  async wait(taskId: string, timeoutMs?: number): Promise<TaskSnapshot> {
    const task = this.tasks.get(taskId);
    if (!task) return this.getStatus(taskId);
    if (isTerminal(task.status)) return snapshot(task);

    if (timeoutMs === undefined) {
      await task.settled;
      return snapshot(task);
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    const expired = new Promise<"expired">((resolve) => {
      timer = setTimeout(() => resolve("expired"), timeoutMs);
    });
    try {
      const outcome = await Promise.race([task.settled.then(() => "settled" as const), expired]);
      if (outcome === "expired") throw new TimeoutError(`Waiting for task "${taskId}"`, timeoutMs);
      return snapshot(task);
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Submit and block until the task is terminal. On deadline the task is
   * cancelled and `Timeout` is thrown. A failed task rethrows its recorded error.
   */
  async runSync(kind: string, payload: unknown, timeoutMs = getConfig().timeouts.runSync): Promise<unknown> {
    const taskId = this.submit(kind, payload);
    let done: TaskSnapshot;
    try {
      done = await this.wait(taskId, timeoutMs);
    } catch (err) {
      if (err instanceof TimeoutError) {
        this.cancel(taskId);
        throw new TimeoutError(`Task "${taskId}" (${kind})`, timeoutMs);
      }
      throw err;
    }

    if (done.status === "succeeded") return done.result;
    if (done.error) throw fromTaskError(done.error);
    throw new SwitchyardError("ComponentError", `Task "${taskId}" ended ${done.status} without an error`);
  }

  /** Newest first. */
  list(opts: ListOptions = {}): TaskSnapshot[] {
    const limit = opts.limit ?? getConfig().tasks.listLimit;
    return [...this.tasks.values()]
      .filter((t) => !opts.status || t.status === opts.status)
      .sort((a, b) => b.createdAt - a.createdAt || b.seq - a.seq)
      .slice(0, limit)
      .map(snapshot);
  }

  /** Forget terminal tasks that finished more than `maxAgeMs` ago. Returns how many were removed. */
  reap(maxAgeMs: number): number {
    const cutoff = this.now() - maxAgeMs;
    let removed = 0;
    for (const [id, task] of this.tasks) {
      if (isTerminal(task.status) && (task.finishedAt ?? 0) <= cutoff) {
        this.tasks.delete(id);
        this.removeFromStore(id);
        removed++;
      }
    }
    if (removed > 0) log.info("Reaped finished tasks", { count: removed });
    return removed;
  }

  startReaper(intervalMs = getConfig().tasks.reapIntervalMs, maxAgeMs = getConfig().tasks.retentionMs): void {
    this.stopReaper();
    this.reaper = setInterval(() => this.reap(maxAgeMs), intervalMs);
    this.reaper.unref();
  }

  stopReaper(): void {
    if (this.reaper) clearInterval(this.reaper);
    this.reaper = undefined;
  }

  stats(): TaskStats {
    const counts: Record<TaskStatus, number> = { pending: 0, running: 0, succeeded: 0, failed: 0, cancelled: 0 };
    for (const task of this.tasks.values()) counts[task.status]++;
    return { counts, activeWorkers: this.active, maxWorkers: this.maxWorkers, queueDepth: this.queue.length };
  }

  /** Stop accepting work and cancel everything not yet terminal. */
  shutdown(): void {
    this.closed = true;
    this.stopReaper();
    for (const task of this.queue.drain()) {
      if (task.status === "pending") this.cancel(task.id);
    }
    for (const task of this.tasks.values()) {
      if (task.status === "running") this.cancel(task.id);
    }
  }

  /** Called with a snapshot after every transition, including submission. */
  subscribe(listener: TaskListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // --- worker pool ---

  private schedulePump(): void {
    if (this.pumpScheduled) return;
    this.pumpScheduled = true;
    queueMicrotask(() => {
      this.pumpScheduled = false;
      this.pump();
    });
  }

  private pump(): void {
    while (this.active < this.maxWorkers) {
      const task = this.queue.dequeue();
      if (!task) return;
      // Cancelled while queued.
      if (task.status !== "pending") continue;

      this.active++;
      this.execute(task).then(
        () => this.release(),
        (err: unknown) => {
          log.error("Worker crashed outside the task boundary", { taskId: task.id, error: String(err) });
          this.release();
        },
      );
    }
  }

  private release(): void {
    this.active--;
    this.pump();
  }

  private async execute(task: TaskRecord): Promise<void> {
    const controller = new AbortController();
    const inflight = new InFlightWork();
    task.controller = controller;
    this.transition(task, "running");
    task.startedAt = this.now();
    this.record(task);
    log.info("Task started", { taskId: task.id, kind: task.kind });

    try {
      // Resolved at start: the task keeps this catalog's runner even if the registry reloads.
      const runner = this.kinds.runnerFor(task.kind);
      if (!runner) throw new UnknownTaskKind(task.kind);

      const result = await runner(task.payload, { taskId: task.id, signal: controller.signal, inflight });
      if (controller.signal.aborted) {
        this.finish(task, "cancelled", { error: new CancelledError(`Task "${task.id}"`).toJSON() });
        return;
      }
      this.finish(task, "succeeded", { result });
    } catch (err) {
      if (controller.signal.aborted) {
        this.finish(task, "cancelled", { error: new CancelledError(`Task "${task.id}"`).toJSON() });
        return;
      }
      const error = toTaskError(err);
      log.warn("Task failed", { taskId: task.id, kind: task.kind, error: error.kind, message: error.message });
      this.finish(task, "failed", { error });
    } finally {
      // The status is already final; the slot stays taken while abandoned calls are still running.
      if (inflight.size > 0) {
        log.info("Holding worker until abandoned calls settle", { taskId: task.id, calls: inflight.size });
        await inflight.settled();
      }
    }
  }

  // --- state machine ---

  private transition(task: TaskRecord, to: TaskStatus): boolean {
    if (!canTransition(task.status, to)) {
      log.warn("Ignored illegal task transition", { taskId: task.id, from: task.status, to });
      return false;
    }
    task.status = to;
    return true;
  }

  private finish(task: TaskRecord, to: TaskStatus, outcome: { result?: unknown; error?: TaskError }): void {
    if (!this.transition(task, to)) return;
    task.finishedAt = this.now();
    if (outcome.error) {
      task.error = outcome.error;
    } else {
      task.result = detach(outcome.result);
    }
    task.controller = undefined;
    this.record(task);
    task.settle();
    log.info(`Task ${to}`, {
      taskId: task.id,
      kind: task.kind,
      durationMs: task.startedAt !== undefined ? task.finishedAt - task.startedAt : 0,
    });
  }

  // --- observers and optional durability ---

  private record(task: TaskRecord): void {
    const snap = snapshot(task);
    if (this.store) {
      try {
        this.store.persistTask(snap);
      } catch (err) {
        log.error("Failed to persist task", { taskId: task.id, error: String(err) });
      }
    }
    for (const listener of this.listeners) {
      try {
        listener(snap);
      } catch (err) {
        log.warn("Task listener threw", { taskId: task.id, error: String(err) });
      }
    }
  }

  /**
   * A stored task this process does not own. Rows a previous process left
   * `pending` or `running` can never finish, so they are failed and written back.
   */
  private loadFromStore(taskId: string): TaskSnapshot | undefined {
    if (!this.store) return undefined;
    let stored: TaskSnapshot | undefined;
    try {
      stored = this.store.loadTask(taskId);
    } catch (err) {
      log.error("Failed to load task from store", { taskId, error: String(err) });
      return undefined;
    }
    if (!stored || isTerminal(stored.status)) return stored;

    const orphan: TaskSnapshot = {
      ...stored,
      status: "failed",
      finishedAt: this.now(),
      error: new SwitchyardError("Cancelled", `Task "${taskId}" was interrupted by a restart`).toJSON(),
    };
    delete orphan.result;
    try {
      this.store.persistTask(orphan);
    } catch (err) {
      log.error("Failed to persist task", { taskId, error: String(err) });
    }
    log.warn("Failed task left unfinished by an earlier process", { taskId, was: stored.status });
    return orphan;
  }

  private removeFromStore(taskId: string): void {
    if (!this.store) return;
    try {
      this.store.deleteTask(taskId);
    } catch (err) {
      log.error("Failed to delete task from store", { taskId, error: String(err) });
    }
  }
}

/** Copy that callers can mutate freely. Values structured clone rejects are shared as they are. */
function detach<T>(value: T): T {
  try {
    return structuredClone(value);
  } catch (err) {
    log.debug("Sharing a value that cannot be cloned", { error: String(err) });
    return value;
  }
}

function snapshot(task: TaskRecord): TaskSnapshot {
  const snap: TaskSnapshot = {
    id: task.id,
    kind: task.kind,
    payload: detach(task.payload),
    status: task.status,
    createdAt: task.createdAt,
  };
  if (task.startedAt !== undefined) snap.startedAt = task.startedAt;
  if (task.finishedAt !== undefined) snap.finishedAt = task.finishedAt;
  if (task.error !== undefined) snap.error = detach(task.error);
  else if (task.status === "succeeded") snap.result = detach(task.result);
  return snap;
}
