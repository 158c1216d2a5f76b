import { log } from "../utils/logger.js";
import { withRetry } from "../utils/retry.js";
import type { BackendAdapter, BackendCallContext, BackendDescriptorOptions } from "./adapter.js";

export type BackendFunction = (input: unknown, ctx: BackendCallContext) => Promise<unknown>;

export type FunctionBackendOptions = BackendDescriptorOptions & {
  fn: BackendFunction;
  /** Health probe; the backend reports healthy when omitted. */
  healthFn?: () => Promise<boolean>;
  /** Extra attempts on failure, with exponential backoff. */
  retries?: number;
  retryDelayMs?: number;
};

/** Wraps an in-process async function as a capability backend. */
export class FunctionBackend implements BackendAdapter {
  readonly name: string;
  readonly type = "function" as const;
  readonly capability: string;
  readonly priority: number;
  readonly enabled: boolean;
  readonly fallback: boolean;
  readonly timeoutMs?: number;
  readonly description?: string;

  private fn: BackendFunction;
  private healthFn?: () => Promise<boolean>;
  private retries: number;
  private retryDelayMs: number;

  constructor(opts: FunctionBackendOptions) {
    this.name = opts.name;
    this.capability = opts.capability;
    this.priority = opts.priority;
    this.enabled = opts.enabled ?? true;
    this.fallback = opts.fallback ?? false;
    this.timeoutMs = opts.timeoutMs;
    this.description = opts.description;
    this.fn = opts.fn;
    this.healthFn = opts.healthFn;
    this.retries = opts.retries ?? 0;
    this.retryDelayMs = opts.retryDelayMs ?? 200;
  }

  async health(): Promise<boolean> {
    return this.healthFn ? this.healthFn() : true;
  }

  async invoke(input: unknown, ctx: BackendCallContext): Promise<unknown> {
    if (this.retries === 0) {
      return this.fn(input, ctx);
    }
    return withRetry(
      (attempt) => {
        if (attempt > 1) log.debug(`[${this.name}] Retrying`, { attempt });
        return this.fn(input, ctx);
      },
      { maxAttempts: this.retries + 1, baseDelayMs: this.retryDelayMs, signal: ctx.signal },
    );
  }
}
