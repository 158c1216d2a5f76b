import type { InvokeOptions, ResolvedOutput } from "../resolver/resolver.js";
import type { Logger } from "../utils/logger.js";
import type { InFlightWork } from "../utils/timeout.js";

/** Mutable mapping threaded through one graph execution. Keys are namespaced, e.g. `meeting.summary`. */
export type PipelineState = Record<string, unknown>;

/** Partial update returned by a component; merged into state, last writer wins. */
export type StateUpdate = Record<string, unknown>;

export type CapabilityInvoker = {
  invoke(capability: string, input: unknown, opts?: InvokeOptions): Promise<ResolvedOutput>;
};

export type ComponentContext = {
  nodeId: string;
  taskId?: string;
  signal: AbortSignal;
  resolver: CapabilityInvoker;
  inflight?: InFlightWork;
  log: Logger;
};

export interface Component {
  readonly name: string;
  readonly description?: string;
  /** Keys that must be present before the component runs. */
  readonly reads?: readonly string[];
  /** Keys the component always writes when it succeeds. */
  readonly writes?: readonly string[];
  /** Capabilities the component resolves. Each needs a usable chain at build time. */
  readonly requires?: readonly string[];

  run(state: Readonly<PipelineState>, ctx: ComponentContext): Promise<StateUpdate>;
}

export const TERMINAL = "terminal";

/** Edge conditions. Declarative forms can come from a config file; `test` needs code. */
export type EdgeCondition =
  | { key: string; equals: unknown }
  | { key: string; notEquals: unknown }
  | { key: string; truthy: boolean }
  | { key: string; exists: boolean }
  | { reads: readonly string[]; test: (state: Readonly<PipelineState>) => boolean; label?: string };

export type GraphEdge = {
  /** Node id, or `terminal`. */
  to: string;
  /** Absent means always true. */
  when?: EdgeCondition;
};

export type GraphNodeDefinition = {
  id: string;
  /** Registered component name. Defaults to the node id. */
  component?: string;
  entry?: boolean;
  timeoutMs?: number;
  edges: GraphEdge[];
};

export type GraphDefinition = {
  name: string;
  description?: string;
  /** Keys the entry payload is expected to carry. */
  inputs?: readonly string[];
  nodes: GraphNodeDefinition[];
};

export type GraphExecutionOptions = {
  resolver: CapabilityInvoker;
  taskId?: string;
  signal?: AbortSignal;
  inflight?: InFlightWork;
  onNodeStart?: (nodeId: string) => void;
  onNodeEnd?: (nodeId: string, update: StateUpdate) => void;
};

export type GraphExecutionResult = {
  graph: string;
  state: PipelineState;
  /** Node ids in the order they ran. */
  path: string[];
  durationMs: number;
};
