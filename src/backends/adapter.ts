/**
 * Context handed to a backend for one call. Adapters that can stop early
 * should honour `signal`; the resolver discards late results regardless.
 */
export type BackendCallContext = {
  signal: AbortSignal;
  capability: string;
  taskId?: string;
};

/**
 * One concrete provider of a capability: a local model server, a remote HTTP
 * API, an in-process function or a mock.
 */
export interface BackendAdapter {
  readonly name: string;
  readonly type: "function" | "http" | "mock" | string;
  readonly capability: string;
  /** Lower is tried first. Distinct within a capability. */
  readonly priority: number;
  readonly enabled: boolean;
  /** Always-available last resort. Its output is tagged as degraded. */
  readonly fallback?: boolean;
  /** Invoke timeout in ms; the resolver's default applies when unset. */
  readonly timeoutMs?: number;
  readonly description?: string;

  /** Fast and side-effect-free. */
  health(ctx: { signal: AbortSignal }): Promise<boolean>;
  invoke(input: unknown, ctx: BackendCallContext): Promise<unknown>;
}

/** Common descriptor fields accepted by the built-in adapters. */
export type BackendDescriptorOptions = {
  name: string;
  capability: string;
  priority: number;
  enabled?: boolean;
  fallback?: boolean;
  timeoutMs?: number;
  description?: string;
};
