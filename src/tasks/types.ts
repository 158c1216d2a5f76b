import type { TaskError } from "../errors.js";
import type { InFlightWork } from "../utils/timeout.js";

export type TaskStatus = "pending" | "running" | "succeeded" | "failed" | "cancelled";

export const TERMINAL_STATUSES: readonly TaskStatus[] = ["succeeded", "failed", "cancelled"];

export function isTerminal(status: TaskStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

/** Allowed transitions. Terminal states have none. */
const TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
  pending: ["running", "cancelled"],
  running: ["succeeded", "failed", "cancelled"],
  succeeded: [],
  failed: [],
  cancelled: [],
};

export function canTransition(from: TaskStatus, to: TaskStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

/** Copy of a task handed to callers. `result` and `error` are never both set. */
export type TaskSnapshot = {
  id: string;
  kind: string;
  payload: unknown;
  status: TaskStatus;
  result?: unknown;
  error?: TaskError;
  createdAt: number;
  startedAt?: number;
  finishedAt?: number;
};

export type CancelOutcome = {
  taskId: string;
  /** Status after the call. A running task stays `running` until it reaches a node boundary. */
  status: TaskStatus;
  /** False when the task was already terminal. */
  cancelled: boolean;
};

export type TaskStats = {
  counts: Record<TaskStatus, number>;
  activeWorkers: number;
  maxWorkers: number;
  queueDepth: number;
};

/** Optional durability collaborator. In-memory state stays authoritative. */
export interface TaskStore {
  persistTask(task: TaskSnapshot): void;
  loadTask(id: string): TaskSnapshot | undefined;
  deleteTask(id: string): boolean;
}

export type TaskRunContext = {
  taskId: string;
  signal: AbortSignal;
  /** Calls the runner stopped waiting for. The worker slot is held until they settle. */
  inflight: InFlightWork;
};

/** Executes one task kind. Bound to the catalog that was live when the task started. */
export type TaskRunner = (payload: unknown, ctx: TaskRunContext) => Promise<unknown>;

export interface TaskKindSource {
  /** Runner for `kind` in the current catalog; throws if the registry is not ready. */
  runnerFor(kind: string): TaskRunner | undefined;
}
