import { z } from "zod";
import { ERROR_KINDS, SwitchyardError, ValidationError } from "../errors.js";
import { TaskStatusSchema } from "../schemas.js";
import type { CancelOutcome, TaskSnapshot, TaskStatus } from "../tasks/types.js";

const WireError = z.object({
  kind: z.enum(ERROR_KINDS),
  message: z.string(),
  details: z.record(z.string(), z.unknown()).optional(),
});

const ErrorBody = z.object({
  error: z.object({ kind: z.string(), message: z.string() }).passthrough(),
});

const Snapshot = z.object({
  id: z.string(),
  kind: z.string(),
  payload: z.unknown(),
  status: TaskStatusSchema,
  result: z.unknown().optional(),
  error: WireError.optional(),
  createdAt: z.number(),
  startedAt: z.number().optional(),
  finishedAt: z.number().optional(),
}).transform((task): TaskSnapshot => ({ ...task, payload: task.payload }));

const Submitted = z.object({ taskId: z.string() });
const TaskList = z.object({ tasks: z.array(Snapshot) });
const Cancelled = z.object({ taskId: z.string(), status: TaskStatusSchema, cancelled: z.boolean() });
const RunResult = z.object({ result: z.unknown() });
const Reaped = z.object({ removed: z.number() });
const Health = z.object({ ok: z.boolean() }).passthrough();

/** Thin HTTP client for the task API, used by the CLI. */
export class ApiClient {
  private base: string;

  constructor(baseUrl: string) {
    this.base = baseUrl.replace(/\/$/, "");
  }

  async isUp(timeoutMs = 1500): Promise<boolean> {
    try {
      const res = await fetch(`${this.base}/api/health`, { signal: AbortSignal.timeout(timeoutMs) });
      const body = Health.safeParse(await res.json());
      return res.ok && body.success && body.data.ok;
    } catch {
      return false;
    }
  }

  async health(probe = false): Promise<Record<string, unknown>> {
    return this.request("GET", `/api/health${probe ? "?probe=true" : ""}`, Health);
  }

  async submit(kind: string, payload: unknown): Promise<string> {
    const { taskId } = await this.request("POST", "/api/tasks", Submitted, { kind, payload });
    return taskId;
  }

  async status(taskId: string): Promise<TaskSnapshot> {
    return this.request("GET", `/api/tasks/${encodeURIComponent(taskId)}`, Snapshot);
  }

  async cancel(taskId: string): Promise<CancelOutcome> {
    return this.request("POST", `/api/tasks/${encodeURIComponent(taskId)}/cancel`, Cancelled);
  }

  async list(opts: { status?: TaskStatus; limit?: number } = {}): Promise<TaskSnapshot[]> {
    const params = new URLSearchParams();
    if (opts.status) params.set("status", opts.status);
    if (opts.limit !== undefined) params.set("limit", String(opts.limit));
    const qs = params.toString();
    const query = qs ? `?${qs}` : "";
    const { tasks } = await this.request("GET", `/api/tasks${query}`, TaskList);
    return tasks;
  }

  async reap(maxAgeMs?: number): Promise<number> {
    const query = maxAgeMs !== undefined ? `?maxAgeMs=${maxAgeMs}` : "";
    const { removed } = await this.request("DELETE", `/api/tasks${query}`, Reaped);
    return removed;
  }

  async run(kind: string, payload: unknown, timeoutMs?: number): Promise<unknown> {
    const { result } = await this.request("POST", "/api/run", RunResult, { kind, payload, timeoutMs });
    return result;
  }

  private async request<S extends z.ZodTypeAny>(
    method: string,
    path: string,
    schema: S,
    body?: unknown,
  ): Promise<z.output<S>> {
    const res = await fetch(`${this.base}${path}`, {
      method,
      headers: body === undefined ? undefined : { "Content-Type": "application/json" },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
    const data: unknown = await res.json();

    if (!res.ok) {
      const parsed = ErrorBody.safeParse(data);
      const wire = parsed.success ? WireError.safeParse(parsed.data.error) : undefined;
      if (wire?.success) throw new SwitchyardError(wire.data.kind, wire.data.message, wire.data.details);
      const message = parsed.success ? parsed.data.error.message : `HTTP ${res.status}`;
      throw new Error(`${method} ${path} failed: ${message}`);
    }

    const parsed = schema.safeParse(data);
    if (!parsed.success) throw new ValidationError(`Unexpected response from ${method} ${path}`);
    return parsed.data;
  }
}
