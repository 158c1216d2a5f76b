import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";
import { getConfig } from "../config.js";
import { type ErrorKind, isSwitchyardError, SwitchyardError, ValidationError } from "../errors.js";
import type { ServiceRegistry } from "../registry/registry.js";
import { ListTasksQuery, parseOrThrow, ReapQuery, RunSyncRequest, SubmitTaskRequest } from "../schemas.js";
import type { TaskManager } from "../tasks/manager.js";
import type { TaskSnapshot } from "../tasks/types.js";
import { log as rootLog } from "../utils/logger.js";

const log = rootLog.child("server");

export type ApiServerOptions = {
  tasks: TaskManager;
  registry: ServiceRegistry;
  port?: number;
  host?: string;
};

const STATUS_BY_KIND: Partial<Record<ErrorKind, number>> = {
  TaskNotFound: 404,
  UnknownTaskKind: 400,
  ValidationError: 400,
  Timeout: 504,
  AllBackendsFailed: 502,
  Cancelled: 409,
};

export function httpStatusFor(err: unknown): number {
  if (!isSwitchyardError(err)) return 500;
  return STATUS_BY_KIND[err.kind] ?? 500;
}

/** JSON API over the task manager, plus a server-sent event stream of task transitions. */
export class ApiServer {
  private tasks: TaskManager;
  private registry: ServiceRegistry;
  private port: number;
  private host: string;
  private server: Server | null = null;
  private sseClients = new Set<ServerResponse>();
  private unsubscribe?: () => void;

  constructor(opts: ApiServerOptions) {
    this.tasks = opts.tasks;
    this.registry = opts.registry;
    this.port = opts.port ?? getConfig().server.port;
    this.host = opts.host ?? getConfig().server.host;
  }

  async start(): Promise<{ port: number; host: string }> {
    const server = createServer((req, res) => {
      this.handleRequest(req, res).catch((err: unknown) => {
        log.error("Request handler error", { error: String(err) });
        if (!res.headersSent) {
          json(res, 500, { error: { kind: "ComponentError", message: "Internal server error" } });
        }
      });
    });
    this.server = server;
    this.unsubscribe = this.tasks.subscribe((task) => this.broadcastSSE(task));

    return new Promise((resolve, reject) => {
      server.once("error", reject);
      server.listen(this.port, this.host, () => {
        const addr = server.address();
        if (addr && typeof addr === "object") {
          this.port = addr.port;
          this.host = addr.address;
        }
        log.info(`API listening on http://${this.host}:${this.port}`);
        resolve({ port: this.port, host: this.host });
      });
    });
  }

  async stop(): Promise<void> {
    this.unsubscribe?.();
    for (const client of this.sseClients) client.end();
    this.sseClients.clear();
    const server = this.server;
    this.server = null;
    if (!server) return;
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  }

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    const pathname = url.pathname;
    const method = req.method ?? "GET";

    res.setHeader("Access-Control-Allow-Origin", "*");
    res.setHeader("Access-Control-Allow-Methods", "GET, POST, DELETE, OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type");

    if (method === "OPTIONS") {
      res.writeHead(204);
      res.end();
      return;
    }

    try {
      if (method === "GET" && pathname === "/api/health") {
        return await this.handleHealth(res, url.searchParams.get("probe") === "true");
      }
      if (method === "GET" && pathname === "/api/kinds") {
        return json(res, 200, { kinds: this.registry.catalog().kinds() });
      }
      if (method === "GET" && pathname === "/api/events") {
        return this.handleSSE(req, res);
      }
      if (method === "GET" && pathname === "/api/tasks") {
        const query = parseOrThrow(ListTasksQuery, Object.fromEntries(url.searchParams), "query");
        return json(res, 200, { tasks: this.tasks.list(query) });
      }
      if (method === "POST" && pathname === "/api/tasks") {
        const body = parseOrThrow(SubmitTaskRequest, await readJson(req), "task request");
        const taskId = this.tasks.submit(body.kind, body.payload);
        return json(res, 202, { taskId });
      }
      if (method === "DELETE" && pathname === "/api/tasks") {
        const query = parseOrThrow(ReapQuery, Object.fromEntries(url.searchParams), "query");
        const removed = this.tasks.reap(query.maxAgeMs ?? getConfig().tasks.retentionMs);
        return json(res, 200, { removed });
      }
      if (method === "POST" && pathname === "/api/run") {
        const body = parseOrThrow(RunSyncRequest, await readJson(req), "run request");
        const result = await this.tasks.runSync(body.kind, body.payload, body.timeoutMs);
        return json(res, 200, { result });
      }

      const cancelMatch = pathname.match(/^\/api\/tasks\/([^/]+)\/cancel$/);
      if (method === "POST" && cancelMatch) {
        return json(res, 200, this.tasks.cancel(decodeURIComponent(cancelMatch[1])));
      }
      const taskMatch = pathname.match(/^\/api\/tasks\/([^/]+)$/);
      if (method === "GET" && taskMatch) {
        return json(res, 200, this.tasks.getStatus(decodeURIComponent(taskMatch[1])));
      }

      json(res, 404, { error: { kind: "NotFound", message: `No route for ${method} ${pathname}` } });
    } catch (err) {
      sendError(res, err);
    }
  }

  private async handleHealth(res: ServerResponse, probe: boolean): Promise<void> {
    const ready = this.registry.ready;
    if (!ready) {
      json(res, 503, { ok: false, ready });
      return;
    }
    const catalog = this.registry.catalog();
    if (probe) await catalog.resolver.checkHealth();
    json(res, 200, {
      ok: true,
      ready,
      catalogVersion: catalog.version,
      tasks: this.tasks.stats(),
      backends: catalog.resolver.cachedHealth(),
      healthCache: catalog.resolver.health.stats(),
    });
  }

  private handleSSE(req: IncomingMessage, res: ServerResponse): void {
    res.writeHead(200, {
      "Content-Type": "text/event-stream",
      "Cache-Control": "no-cache",
      Connection: "keep-alive",
    });
    res.write(":\n\n");

    this.sseClients.add(res);
    req.on("close", () => {
      this.sseClients.delete(res);
    });
  }

  private broadcastSSE(task: TaskSnapshot): void {
    if (this.sseClients.size === 0) return;
    const data = `event: task:${task.status}\ndata: ${JSON.stringify(task)}\n\n`;
    for (const client of this.sseClients) {
      client.write(data);
    }
  }
}

function sendError(res: ServerResponse, err: unknown): void {
  const status = httpStatusFor(err);
  if (status === 500) log.error("Request failed", { error: String(err) });
  const error = err instanceof SwitchyardError
    ? err.toJSON()
    : { kind: "ComponentError", message: err instanceof Error ? err.message : String(err) };
  json(res, status, { error });
}

function json(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

async function readJson(req: IncomingMessage): Promise<unknown> {
  const body = await readBody(req);
  if (body.trim() === "") return {};
  try {
    const parsed: unknown = JSON.parse(body);
    return parsed;
  } catch {
    throw new ValidationError("Invalid JSON body");
  }
}

function readBody(req: IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on("data", (chunk: Buffer) => chunks.push(chunk));
    req.on("end", () => resolve(Buffer.concat(chunks).toString("utf-8")));
    req.on("error", reject);
  });
}
