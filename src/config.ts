export type SwitchyardConfig = {
  timeouts: {
    /** Upper bound for a single backend health probe. */
    healthCheck: number;
    /** Invoke timeout for backends that don't set their own. */
    backendDefault: number;
    /** Default deadline for runSync when the caller passes none. */
    runSync: number;
  };
  workers: {
    maxWorkers: number;
  };
  healthCache: {
    ttlMs: number;
  };
  tasks: {
    /** Terminal tasks older than this are removed by the periodic reaper. */
    retentionMs: number;
    reapIntervalMs: number;
    listLimit: number;
  };
  server: {
    port: number;
    host: string;
  };
  store: {
    path?: string;
  };
  cli: {
    pollIntervalMs: number;
  };
};

type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends object ? DeepPartial<T[P]> : T[P];
};

export type SwitchyardConfigOverrides = DeepPartial<SwitchyardConfig>;

const DEFAULTS: SwitchyardConfig = {
  timeouts: {
    healthCheck: 1_500,
    backendDefault: 60_000,
    runSync: 300_000,
  },
  workers: {
    maxWorkers: 4,
  },
  healthCache: {
    ttlMs: 15_000,
  },
  tasks: {
    retentionMs: 60 * 60 * 1000, // 1 hour
    reapIntervalMs: 5 * 60 * 1000,
    listLimit: 100,
  },
  server: {
    port: 5000,
    host: "127.0.0.1",
  },
  store: {},
  cli: {
    pollIntervalMs: 500,
  },
};

let current: SwitchyardConfig = structuredClone(DEFAULTS);

/** Merge overrides into a copy of `base` without touching the process-wide config. */
export function mergeConfig(base: SwitchyardConfig, overrides: SwitchyardConfigOverrides): SwitchyardConfig {
  return {
    timeouts: { ...base.timeouts, ...overrides.timeouts },
    workers: { ...base.workers, ...overrides.workers },
    healthCache: { ...base.healthCache, ...overrides.healthCache },
    tasks: { ...base.tasks, ...overrides.tasks },
    server: { ...base.server, ...overrides.server },
    store: { ...base.store, ...overrides.store },
    cli: { ...base.cli, ...overrides.cli },
  };
}

/** Override config values. Merges deeply with defaults. */
export function configure(overrides: SwitchyardConfigOverrides): void {
  current = mergeConfig(DEFAULTS, overrides);
}

/** Reset config to defaults. */
export function resetConfig(): void {
  current = structuredClone(DEFAULTS);
}

/** Get the current config (read-only). */
export function getConfig(): Readonly<SwitchyardConfig> {
  return current;
}

/** The default config values (frozen). */
export const defaults: Readonly<SwitchyardConfig> = Object.freeze(structuredClone(DEFAULTS));
