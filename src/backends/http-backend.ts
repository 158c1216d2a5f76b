import { log } from "../utils/logger.js";
import type { BackendAdapter, BackendCallContext, BackendDescriptorOptions } from "./adapter.js";

export type HttpBackendOptions = BackendDescriptorOptions & {
  url: string;
  /** Probed with GET. Defaults to `<url>/health`. */
  healthUrl?: string;
  headers?: Record<string, string>;
};

export class HttpStatusError extends Error {
  constructor(readonly status: number, body: string) {
    super(`HTTP ${status}: ${body.slice(0, 300)}`);
    this.name = "HttpStatusError";
  }
}

/**
 * Calls a model server or remote API over HTTP.
 * Request body: `{ capability, input }`; the JSON response body is the output
 * (plain text bodies are returned as strings).
 */
export class HttpBackend implements BackendAdapter {
  readonly name: string;
  readonly type = "http" as const;
  readonly capability: string;
  readonly priority: number;
  readonly enabled: boolean;
  readonly fallback: boolean;
  readonly timeoutMs?: number;
  readonly description?: string;

  readonly url: string;
  readonly healthUrl: string;
  private headers: Record<string, string>;

  constructor(opts: HttpBackendOptions) {
    this.name = opts.name;
    this.capability = opts.capability;
    this.priority = opts.priority;
    this.enabled = opts.enabled ?? true;
    this.fallback = opts.fallback ?? false;
    this.timeoutMs = opts.timeoutMs;
    this.description = opts.description;
    this.url = opts.url;
    this.healthUrl = opts.healthUrl ?? `${opts.url.replace(/\/$/, "")}/health`;
    this.headers = opts.headers ?? {};
  }

  async invoke(input: unknown, ctx: BackendCallContext): Promise<unknown> {
    log.debug(`[${this.name}] POST ${this.url}`, { capability: ctx.capability, taskId: ctx.taskId });

    const res = await fetch(this.url, {
      method: "POST",
      headers: { "Content-Type": "application/json", ...this.headers },
      body: JSON.stringify({ capability: ctx.capability, input }),
      signal: ctx.signal,
    });

    const body = await res.text();
    if (!res.ok) {
      throw new HttpStatusError(res.status, body);
    }

    const contentType = res.headers.get("content-type") ?? "";
    if (contentType.includes("application/json")) {
      const parsed: unknown = JSON.parse(body);
      return parsed;
    }
    return body;
  }

  async health(ctx: { signal: AbortSignal }): Promise<boolean> {
    try {
      const res = await fetch(this.healthUrl, {
        method: "GET",
        headers: this.headers,
        signal: ctx.signal,
      });
      // Drain the body so the socket is released.
      await res.arrayBuffer();
      return res.ok;
    } catch (err) {
      log.debug(`[${this.name}] Health probe failed`, { error: String(err) });
      return false;
    }
  }
}
