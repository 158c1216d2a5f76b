// Config
export { getConfig, configure, resetConfig, mergeConfig, defaults } from "./config.js";
export type { SwitchyardConfig, SwitchyardConfigOverrides } from "./config.js";
export { loadConfigFile, parseConfigFile, toBackend, toGraphDefinition } from "./config-file.js";

// Errors
export {
  SwitchyardError,
  UnknownTaskKind,
  TaskNotFound,
  BackendUnhealthy,
  BackendTimeout,
  BackendInvocationError,
  AllBackendsFailed,
  MissingStateKey,
  NoMatchingEdge,
  GraphCycleError,
  ComponentError,
  ConfigurationError,
  ValidationError,
  TimeoutError,
  CancelledError,
  isSwitchyardError,
  toTaskError,
  fromTaskError,
} from "./errors.js";
export type { ErrorKind, TaskError, BackendFailure } from "./errors.js";

// Schemas
export { parseOrThrow, SubmitTaskRequest, RunSyncRequest, ConfigFile } from "./schemas.js";

// Backends
export type { BackendAdapter, BackendCallContext, BackendDescriptorOptions } from "./backends/adapter.js";
export { FunctionBackend } from "./backends/function-backend.js";
export type { BackendFunction, FunctionBackendOptions } from "./backends/function-backend.js";
export { HttpBackend, HttpStatusError } from "./backends/http-backend.js";
export type { HttpBackendOptions } from "./backends/http-backend.js";
export { MockBackend, defaultMockOutput } from "./backends/mock-backend.js";
export type { MockBackendOptions } from "./backends/mock-backend.js";

// Resolver
export { CapabilityResolver } from "./resolver/resolver.js";
export type { ResolvedOutput, InvokeOptions, ResolverOptions } from "./resolver/resolver.js";
export { HealthMonitor } from "./resolver/health.js";
export type { BackendHealth, HealthMonitorOptions } from "./resolver/health.js";

// Graph
export { ComponentGraph, runComponent, evaluateCondition } from "./graph/executor.js";
export { validateGraph, collectGraphIssues, findCycle } from "./graph/validate.js";
export { TERMINAL } from "./graph/types.js";
export type {
  Component,
  ComponentContext,
  EdgeCondition,
  GraphDefinition,
  GraphEdge,
  GraphNodeDefinition,
  GraphExecutionOptions,
  GraphExecutionResult,
  PipelineState,
  StateUpdate,
} from "./graph/types.js";

// Components and pipelines
export { builtinComponents } from "./components/index.js";
export { builtinPipelines, registerBuiltins, registerMockFallbacks, BUILTIN_CAPABILITIES } from "./pipelines/index.js";

// Tasks
export { TaskManager } from "./tasks/manager.js";
export type { TaskManagerOptions, ListOptions, TaskListener } from "./tasks/manager.js";
export type { TaskStatus, TaskSnapshot, CancelOutcome, TaskStats, TaskStore, TaskRunner } from "./tasks/types.js";

// Registry
export { ServiceRegistry, RegistryDraft } from "./registry/registry.js";
export type { ServiceRegistryOptions } from "./registry/registry.js";
export { Catalog } from "./registry/catalog.js";

// Runtime, persistence and transport
export { createRuntime } from "./runtime.js";
export type { Runtime, RuntimeOptions } from "./runtime.js";
export { SqliteTaskStore } from "./persistence/store.js";
export { ApiServer, httpStatusFor } from "./server/server.js";
export type { ApiServerOptions } from "./server/server.js";
export { ApiClient } from "./server/client.js";

// Utils
export { log, setLogLevel } from "./utils/logger.js";
export type { Logger, LogLevel } from "./utils/logger.js";
export { withRetry } from "./utils/retry.js";
export { TtlCache } from "./utils/ttl-cache.js";
