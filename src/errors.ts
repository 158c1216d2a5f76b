export const ERROR_KINDS = [
  "UnknownTaskKind",
  "TaskNotFound",
  "BackendUnhealthy",
  "BackendTimeout",
  "BackendInvocationError",
  "AllBackendsFailed",
  "MissingStateKey",
  "NoMatchingEdge",
  "GraphCycleError",
  "ConfigurationError",
  "Timeout",
  "Cancelled",
  "ComponentError",
  "ValidationError",
] as const;

export type ErrorKind = (typeof ERROR_KINDS)[number];

/** Structured error recorded on a failed task and returned over the wire. */
export type TaskError = {
  kind: ErrorKind;
  message: string;
  details?: Record<string, unknown>;
};

export class SwitchyardError extends Error {
  readonly kind: ErrorKind;
  readonly details?: Record<string, unknown>;

  constructor(kind: ErrorKind, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = kind;
    this.kind = kind;
    this.details = details;
  }

  toJSON(): TaskError {
    return this.details
      ? { kind: this.kind, message: this.message, details: this.details }
      : { kind: this.kind, message: this.message };
  }
}

export class UnknownTaskKind extends SwitchyardError {
  constructor(readonly taskKind: string) {
    super("UnknownTaskKind", `Unknown task kind "${taskKind}"`, { taskKind });
  }
}

export class TaskNotFound extends SwitchyardError {
  constructor(readonly taskId: string) {
    super("TaskNotFound", `Task "${taskId}" not found`, { taskId });
  }
}

// --- Backend-local errors: recovered inside a resolution ---

export class BackendUnhealthy extends SwitchyardError {
  constructor(readonly backend: string, reason = "health check failed") {
    super("BackendUnhealthy", `Backend "${backend}" is unhealthy: ${reason}`, { backend });
  }
}

export class BackendTimeout extends SwitchyardError {
  constructor(readonly backend: string, readonly timeoutMs: number) {
    super("BackendTimeout", `Backend "${backend}" timed out after ${timeoutMs}ms`, { backend, timeoutMs });
  }
}

export class BackendInvocationError extends SwitchyardError {
  constructor(readonly backend: string, reason: string) {
    super("BackendInvocationError", `Backend "${backend}" failed: ${reason}`, { backend });
  }
}

export type BackendFailure = {
  backend: string;
  kind: "BackendUnhealthy" | "BackendTimeout" | "BackendInvocationError";
  message: string;
};

export class AllBackendsFailed extends SwitchyardError {
  constructor(readonly capability: string, readonly failures: BackendFailure[]) {
    const summary = failures.length > 0
      ? failures.map((f) => `${f.backend}: ${f.message}`).join("; ")
      : "no enabled backends";
    super("AllBackendsFailed", `All backends failed for "${capability}" (${summary})`, {
      capability,
      failures,
    });
  }
}

// --- Graph errors ---

export class MissingStateKey extends SwitchyardError {
  constructor(readonly key: string, nodeId: string) {
    super("MissingStateKey", `State key "${key}" is missing at node "${nodeId}"`, { key, nodeId });
  }
}

export class NoMatchingEdge extends SwitchyardError {
  constructor(readonly nodeId: string) {
    super("NoMatchingEdge", `No outgoing edge of node "${nodeId}" matched the current state`, { nodeId });
  }
}

export class GraphCycleError extends SwitchyardError {
  constructor(readonly graph: string, readonly cycle: string[]) {
    super("GraphCycleError", `Graph "${graph}" contains a cycle: ${cycle.join(" -> ")}`, { graph, cycle });
  }
}

export class ComponentError extends SwitchyardError {
  constructor(readonly component: string, reason: string, readonly nodeId?: string) {
    super("ComponentError", `Component "${component}" failed: ${reason}`, nodeId ? { component, nodeId } : { component });
  }
}

// --- Registration and caller errors ---

export class ConfigurationError extends SwitchyardError {
  readonly issues: SwitchyardError[];

  constructor(message: string, issues: SwitchyardError[] = []) {
    const full = issues.length > 0
      ? `${message}:\n${issues.map((i) => `  - ${i.message}`).join("\n")}`
      : message;
    super("ConfigurationError", full, issues.length > 0 ? { issues: issues.map((i) => i.toJSON()) } : undefined);
    this.issues = issues;
  }
}

export class ValidationError extends SwitchyardError {
  constructor(message: string) {
    super("ValidationError", message);
  }
}

export class TimeoutError extends SwitchyardError {
  constructor(what: string, readonly timeoutMs: number) {
    super("Timeout", `${what} timed out after ${timeoutMs}ms`, { timeoutMs });
  }
}

export class CancelledError extends SwitchyardError {
  constructor(what = "Execution") {
    super("Cancelled", `${what} was cancelled`);
  }
}

export function isSwitchyardError(err: unknown): err is SwitchyardError {
  return err instanceof SwitchyardError;
}

/** Map any thrown value to the structured form recorded on a task. */
export function toTaskError(err: unknown): TaskError {
  if (err instanceof SwitchyardError) return err.toJSON();
  const message = err instanceof Error ? err.message : String(err);
  return { kind: "ComponentError", message };
}

/** Rebuild a throwable error from its recorded form. */
export function fromTaskError(error: TaskError): SwitchyardError {
  return new SwitchyardError(error.kind, error.message, error.details);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
