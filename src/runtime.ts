import type { BackendAdapter } from "./backends/adapter.js";
import { configure, defaults, mergeConfig, type SwitchyardConfig, type SwitchyardConfigOverrides } from "./config.js";
import { loadConfigFile, parseConfigFile, toBackend, toConfigOverrides, toGraphDefinition } from "./config-file.js";
import { SqliteTaskStore } from "./persistence/store.js";
import { registerBuiltins, registerMockFallbacks } from "./pipelines/index.js";
import { HealthMonitor } from "./resolver/health.js";
import { ServiceRegistry } from "./registry/registry.js";
import type { ConfigFile } from "./schemas.js";
import { TaskManager } from "./tasks/manager.js";
import { log } from "./utils/logger.js";

export type RuntimeOptions = {
  /** Path of a JSON config file. */
  configPath?: string;
  /** Already-parsed config file contents; ignored when `configPath` is set. */
  file?: unknown;
  /** Applied on top of the config file, e.g. from CLI flags. */
  overrides?: SwitchyardConfigOverrides;
  /** Extra registrations made before the registry is built. */
  setup?: (registry: ServiceRegistry) => void;
  /** Start the periodic reaper. Defaults to true. */
  reaper?: boolean;
};

export type Runtime = {
  config: SwitchyardConfig;
  registry: ServiceRegistry;
  tasks: TaskManager;
  store?: SqliteTaskStore;
  close(): void;
};

/**
 * Wire a running system from configuration: process settings, registry,
 * built catalog and task manager. Throws `ConfigurationError` when the
 * registrations do not build.
 */
export function createRuntime(opts: RuntimeOptions = {}): Runtime {
  const file: ConfigFile = opts.configPath ? loadConfigFile(opts.configPath) : parseConfigFile(opts.file ?? {});
  const config = mergeConfig(mergeConfig(defaults, toConfigOverrides(file)), opts.overrides ?? {});
  configure(config);

  const registry = new ServiceRegistry({
    health: new HealthMonitor({ ttlMs: config.healthCache.ttlMs, timeoutMs: config.timeouts.healthCheck }),
    defaultTimeoutMs: config.timeouts.backendDefault,
  });

  const backends: BackendAdapter[] = file.backends.map(toBackend);
  for (const backend of backends) registry.registerBackend(backend);
  if (file.builtins) {
    registerBuiltins(registry);
    if (file.mockFallbacks) registerMockFallbacks(registry, backends);
  }
  for (const capability of file.optionalCapabilities) registry.markOptional(capability);
  for (const graph of file.graphs) registry.registerGraph(toGraphDefinition(graph));
  opts.setup?.(registry);

  const catalog = registry.build();

  const store = config.store.path ? new SqliteTaskStore(config.store.path) : undefined;
  const tasks = new TaskManager({ kinds: registry, maxWorkers: config.workers.maxWorkers, store });
  if (opts.reaper !== false) tasks.startReaper(config.tasks.reapIntervalMs, config.tasks.retentionMs);

  log.info("Runtime ready", {
    maxWorkers: tasks.maxWorkers,
    kinds: catalog.kinds().length,
    store: config.store.path ?? "(memory only)",
  });

  return {
    config,
    registry,
    tasks,
    store,
    close() {
      tasks.shutdown();
      store?.close();
    },
  };
}
