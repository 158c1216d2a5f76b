import { afterAll, beforeAll, describe, expect, it, vi } from "vitest";
import { FunctionBackend } from "../../src/backends/function-backend.js";
import {
  AllBackendsFailed,
  CancelledError,
  ComponentError,
  SwitchyardError,
  TaskNotFound,
  TimeoutError,
  UnknownTaskKind,
  ValidationError,
} from "../../src/errors.js";
import { ServiceRegistry } from "../../src/registry/registry.js";
import { ApiClient } from "../../src/server/client.js";
import { ApiServer, httpStatusFor } from "../../src/server/server.js";
import { TaskManager } from "../../src/tasks/manager.js";

describe("httpStatusFor", () => {
  it("maps error kinds to status codes", () => {
    expect(httpStatusFor(new TaskNotFound("x"))).toBe(404);
    expect(httpStatusFor(new UnknownTaskKind("x"))).toBe(400);
    expect(httpStatusFor(new ValidationError("x"))).toBe(400);
    expect(httpStatusFor(new TimeoutError("x", 1))).toBe(504);
    expect(httpStatusFor(new AllBackendsFailed("x", []))).toBe(502);
    expect(httpStatusFor(new CancelledError())).toBe(409);
    expect(httpStatusFor(new ComponentError("c", "boom"))).toBe(500);
    expect(httpStatusFor(new Error("plain"))).toBe(500);
  });
});

describe("ApiServer", () => {
  let server: ApiServer;
  let tasks: TaskManager;
  let base: string;
  let client: ApiClient;

  beforeAll(async () => {
    const registry = new ServiceRegistry()
      .registerBackend(
        new FunctionBackend({ name: "echo-local", capability: "echo", priority: 1, fn: async (input) => ({ echo: input }) }),
      )
      .registerBackend(
        new FunctionBackend({
          name: "flaky",
          capability: "broken",
          priority: 1,
          fn: async () => {
            throw new Error("offline");
          },
        }),
      )
      .registerComponent({
        name: "hang",
        run: (_state, ctx) =>
          new Promise((resolve) => {
            ctx.signal.addEventListener("abort", () => resolve({}));
          }),
      });
    registry.build();
    tasks = new TaskManager({ kinds: registry, maxWorkers: 2 });
    server = new ApiServer({ tasks, registry, port: 0, host: "127.0.0.1" });
    const addr = await server.start();
    base = `http://127.0.0.1:${addr.port}`;
    client = new ApiClient(base);
  });

  afterAll(async () => {
    tasks.shutdown();
    await server.stop();
  });

  it("reports health and the catalog", async () => {
    expect(await client.isUp()).toBe(true);
    const health = await client.health(true);
    expect(health).toMatchObject({ ok: true, ready: true, catalogVersion: 1, tasks: { maxWorkers: 2 } });
    expect(health).toMatchObject({ healthCache: { size: 2, evictions: 0 } });

    const res = await fetch(`${base}/api/kinds`);
    expect(await res.json()).toEqual({ kinds: ["component:hang", "capability:echo", "capability:broken"] });
  });

  it("submits a task and reports its status", async () => {
    const id = await client.submit("capability:echo", { n: 1 });
    await vi.waitFor(async () => expect((await client.status(id)).status).toBe("succeeded"));

    const task = await client.status(id);
    expect(task).toMatchObject({ id, kind: "capability:echo", payload: { n: 1 }, result: { backend: "echo-local", output: { echo: { n: 1 } } } });
  });

  it("runs a task synchronously", async () => {
    await expect(client.run("capability:echo", "ping")).resolves.toMatchObject({ output: { echo: "ping" }, degraded: false });
  });

  it("returns the recorded error with a matching status", async () => {
    const res = await fetch(`${base}/api/run`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ kind: "capability:broken", payload: {} }),
    });
    expect(res.status).toBe(502);
    expect(await res.json()).toMatchObject({ error: { kind: "AllBackendsFailed" } });

    const err = await client.run("capability:broken", {}).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(SwitchyardError);
    expect(err).toMatchObject({ kind: "AllBackendsFailed" });
  });

  it("answers 504 when a synchronous run misses its deadline", async () => {
    const res = await fetch(`${base}/api/run`, {
      method: "POST",
      body: JSON.stringify({ kind: "component:hang", payload: {}, timeoutMs: 30 }),
    });
    expect(res.status).toBe(504);
    expect(await res.json()).toMatchObject({ error: { kind: "Timeout" } });
  });

  it("rejects bad requests", async () => {
    const unknown = await fetch(`${base}/api/tasks`, { method: "POST", body: JSON.stringify({ kind: "nope" }) });
    expect(unknown.status).toBe(400);
    expect(await unknown.json()).toEqual({
      error: { kind: "UnknownTaskKind", message: 'Unknown task kind "nope"', details: { taskKind: "nope" } },
    });

    const garbled = await fetch(`${base}/api/tasks`, { method: "POST", body: "{not json" });
    expect(garbled.status).toBe(400);
    expect(await garbled.json()).toEqual({ error: { kind: "ValidationError", message: "Invalid JSON body" } });

    const invalid = await fetch(`${base}/api/tasks`, { method: "POST", body: JSON.stringify({ payload: 1 }) });
    expect(invalid.status).toBe(400);
    expect(await invalid.json()).toMatchObject({ error: { kind: "ValidationError" } });
  });

  it("answers 404 for unknown tasks and routes", async () => {
    const err = await client.status("missing").catch((e: unknown) => e);
    expect(err).toMatchObject({ kind: "TaskNotFound", message: 'Task "missing" not found' });

    const res = await fetch(`${base}/api/nowhere`);
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: { kind: "NotFound", message: "No route for GET /api/nowhere" } });
  });

  it("cancels a running task", async () => {
    const id = await client.submit("component:hang", {});
    await vi.waitFor(async () => expect((await client.status(id)).status).toBe("running"));

    expect(await client.cancel(id)).toEqual({ taskId: id, status: "running", cancelled: true });
    await vi.waitFor(async () => expect((await client.status(id)).status).toBe("cancelled"));
    expect((await client.status(id)).error?.kind).toBe("Cancelled");
  });

  it("lists tasks with filters and reaps finished ones", async () => {
    const id = await client.submit("capability:echo", "listed");
    await vi.waitFor(async () => expect((await client.status(id)).status).toBe("succeeded"));

    const [newest] = await client.list({ status: "succeeded", limit: 1 });
    expect(newest.id).toBe(id);

    const removed = await client.reap(0);
    expect(removed).toBeGreaterThan(0);
    expect(await client.list({ status: "succeeded" })).toEqual([]);
  });

  it("streams task transitions as server-sent events", async () => {
    const controller = new AbortController();
    const res = await fetch(`${base}/api/events`, { signal: controller.signal });
    expect(res.headers.get("content-type")).toBe("text/event-stream");
    const reader = res.body?.getReader();
    if (!reader) throw new Error("no response body");

    const id = await client.submit("capability:echo", "streamed");
    const decoder = new TextDecoder();
    let text = "";
    while (!text.includes("event: task:succeeded")) {
      const { value, done } = await reader.read();
      if (done) break;
      text += decoder.decode(value, { stream: true });
    }
    controller.abort();

    expect(text).toContain("event: task:pending\ndata: ");
    expect(text).toContain(`"id":"${id}"`);
    expect(text).toContain("event: task:succeeded");
  });
});
