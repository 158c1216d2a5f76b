import type { BackendAdapter } from "../backends/adapter.js";
import { getConfig } from "../config.js";
import {
  AllBackendsFailed,
  type BackendFailure,
  BackendInvocationError,
  BackendTimeout,
  BackendUnhealthy,
  CancelledError,
  errorMessage,
} from "../errors.js";
import { log as rootLog } from "../utils/logger.js";
import { abortable, DeadlineExceeded, type InFlightWork, linkedController, withTimeout } from "../utils/timeout.js";
import { type BackendHealth, HealthMonitor } from "./health.js";

const log = rootLog.child("resolver");

/** Output of a resolution, tagged with the backend that actually served it. */
export type ResolvedOutput = {
  output: unknown;
  capability: string;
  backend: string;
  /** True when a last-resort fallback produced the output. */
  degraded: boolean;
  /** Backends skipped before `backend` served the request, in order. */
  failures: BackendFailure[];
  durationMs: number;
};

export type InvokeOptions = {
  signal?: AbortSignal;
  taskId?: string;
  /** Receives backend calls that were still running when the resolver gave up on them. */
  inflight?: InFlightWork;
};

export type ResolverOptions = {
  health?: HealthMonitor;
  /** Invoke timeout for backends without their own. */
  defaultTimeoutMs?: number;
};

/**
 * Resolves a logical capability to the first healthy backend of its chain.
 * Chains are fixed at construction: enabled backends only, ascending priority.
 */
export class CapabilityResolver {
  readonly health: HealthMonitor;
  private chains = new Map<string, BackendAdapter[]>();
  private defaultTimeoutMs?: number;

  constructor(backends: readonly BackendAdapter[], opts: ResolverOptions = {}) {
    this.health = opts.health ?? new HealthMonitor();
    this.defaultTimeoutMs = opts.defaultTimeoutMs;

    for (const backend of backends) {
      if (!backend.enabled) continue;
      const chain = this.chains.get(backend.capability) ?? [];
      chain.push(backend);
      this.chains.set(backend.capability, chain);
    }
    for (const chain of this.chains.values()) {
      chain.sort((a, b) => a.priority - b.priority);
    }
  }

  /** Enabled backends for a capability in the order they are tried. */
  chain(capability: string): readonly BackendAdapter[] {
    return this.chains.get(capability) ?? [];
  }

  capabilities(): string[] {
    return [...this.chains.keys()];
  }

  async invoke(capability: string, input: unknown, opts: InvokeOptions = {}): Promise<ResolvedOutput> {
    const { signal, taskId, inflight } = opts;
    const start = Date.now();
    const failures: BackendFailure[] = [];
    const chain = this.chain(capability);

    for (const backend of chain) {
      throwIfCancelled(signal, capability);

      if (!backend.fallback) {
        const health = await this.health.check(backend);
        throwIfCancelled(signal, capability);
        if (!health.healthy) {
          failures.push(toFailure(new BackendUnhealthy(backend.name, health.error)));
          log.info(`Skipping unhealthy backend "${backend.name}"`, { capability, error: health.error });
          continue;
        }
      }

      const timeoutMs = backend.timeoutMs ?? this.defaultTimeoutMs ?? getConfig().timeouts.backendDefault;
      const controller = linkedController(signal);
      let pending: Promise<unknown> | undefined;
      try {
        log.debug(`Invoking "${backend.name}"`, { capability, taskId, timeoutMs });
        pending = backend.invoke(input, { signal: controller.signal, capability, taskId });
        // The resolver cannot interrupt a call in flight; it stops waiting and hands the call to `inflight`.
        const output = await abortable(withTimeout(pending, timeoutMs, controller), signal);
        throwIfCancelled(signal, capability);

        const degraded = backend.fallback === true;
        if (degraded) {
          log.warn(`Serving "${capability}" from fallback backend "${backend.name}"`, { failures: failures.length });
        }
        return {
          output,
          capability,
          backend: backend.name,
          degraded,
          failures,
          durationMs: Date.now() - start,
        };
      } catch (err) {
        if (pending) inflight?.add(pending);
        if (signal?.aborted) throw new CancelledError(`Resolution of "${capability}"`);
        const failure = err instanceof DeadlineExceeded
          ? new BackendTimeout(backend.name, timeoutMs)
          : new BackendInvocationError(backend.name, errorMessage(err));
        failures.push(toFailure(failure));
        this.health.invalidate(backend);
        log.warn(failure.message, { capability, taskId });
      } finally {
        controller.abort();
      }
    }

    throw new AllBackendsFailed(capability, failures);
  }

  /** Probe every enabled backend, optionally for one capability only. */
  async checkHealth(capability?: string): Promise<BackendHealth[]> {
    const backends = capability ? this.chain(capability) : [...this.chains.values()].flat();
    return Promise.all(backends.map((b) => this.health.probe(b)));
  }

  /** Cached health for every enabled backend, without probing. */
  cachedHealth(): Array<{ name: string; capability: string; priority: number; fallback: boolean; health?: BackendHealth }> {
    return [...this.chains.values()].flat().map((b) => ({
      name: b.name,
      capability: b.capability,
      priority: b.priority,
      fallback: b.fallback === true,
      health: this.health.cached(b),
    }));
  }
}

function throwIfCancelled(signal: AbortSignal | undefined, capability: string): void {
  if (signal?.aborted) throw new CancelledError(`Resolution of "${capability}"`);
}

function toFailure(err: BackendUnhealthy | BackendTimeout | BackendInvocationError): BackendFailure {
  const kind = err instanceof BackendUnhealthy
    ? "BackendUnhealthy"
    : err instanceof BackendTimeout
      ? "BackendTimeout"
      : "BackendInvocationError";
  return { backend: err.backend, kind, message: err.message };
}
