import type { BackendAdapter } from "../backends/adapter.js";
import { getConfig } from "../config.js";
import { log } from "../utils/logger.js";
import { DeadlineExceeded, withTimeout } from "../utils/timeout.js";
import { type CacheStats, TtlCache } from "../utils/ttl-cache.js";

export type BackendHealth = {
  name: string;
  capability: string;
  healthy: boolean;
  lastCheck: number;
  responseTimeMs?: number;
  error?: string;
};

export type HealthMonitorOptions = {
  /** How long a probe result is trusted. Applies to healthy and unhealthy results alike. */
  ttlMs?: number;
  /** Upper bound for one probe. */
  timeoutMs?: number;
  now?: () => number;
};

/**
 * Probes backends and remembers the result for a short TTL. One monitor is
 * shared by every resolution in the process, so concurrent callers see the
 * same verdict and an expensive backend is not re-probed on every call.
 */
export class HealthMonitor {
  private cache: TtlCache<BackendHealth>;
  private inflight = new Map<string, Promise<BackendHealth>>();
  private timeoutMs?: number;
  private now: () => number;

  constructor(opts: HealthMonitorOptions = {}) {
    this.now = opts.now ?? Date.now;
    this.cache = new TtlCache<BackendHealth>({
      ttlMs: opts.ttlMs ?? getConfig().healthCache.ttlMs,
      now: this.now,
    });
    this.timeoutMs = opts.timeoutMs;
  }

  static key(backend: Pick<BackendAdapter, "name" | "capability">): string {
    return `${backend.capability}/${backend.name}`;
  }

  /** Cached verdict if still fresh, otherwise a new probe. */
  async check(backend: BackendAdapter): Promise<BackendHealth> {
    const key = HealthMonitor.key(backend);
    const cached = this.cache.get(key);
    if (cached) return cached;

    // Concurrent resolutions share one probe.
    const pending = this.inflight.get(key);
    if (pending) return pending;

    const probe = this.probe(backend).finally(() => this.inflight.delete(key));
    this.inflight.set(key, probe);
    return probe;
  }

  /** Probe now, bypassing the cache, and store the result. */
  async probe(backend: BackendAdapter): Promise<BackendHealth> {
    const timeoutMs = this.timeoutMs ?? getConfig().timeouts.healthCheck;
    const start = this.now();
    const controller = new AbortController();
    let result: BackendHealth;
    try {
      const healthy = await withTimeout(backend.health({ signal: controller.signal }), timeoutMs, controller);
      result = {
        name: backend.name,
        capability: backend.capability,
        healthy,
        lastCheck: this.now(),
        responseTimeMs: this.now() - start,
        error: healthy ? undefined : "reported unhealthy",
      };
    } catch (err) {
      const error = err instanceof DeadlineExceeded ? `health check timed out after ${timeoutMs}ms` : String(err);
      result = {
        name: backend.name,
        capability: backend.capability,
        healthy: false,
        lastCheck: this.now(),
        responseTimeMs: this.now() - start,
        error,
      };
      log.warn(`Health check failed for backend "${backend.name}"`, { capability: backend.capability, error });
    }
    this.cache.set(HealthMonitor.key(backend), result);
    return result;
  }

  /** Drop the cached verdict so the next resolution probes again. */
  invalidate(backend: BackendAdapter): void {
    this.cache.delete(HealthMonitor.key(backend));
  }

  /** Cached verdict without probing. */
  cached(backend: BackendAdapter): BackendHealth | undefined {
    return this.cache.get(HealthMonitor.key(backend));
  }

  clear(): void {
    this.cache.clear();
  }

  stats(): CacheStats {
    return this.cache.getStats();
  }
}
