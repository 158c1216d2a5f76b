import { isDeepStrictEqual } from "node:util";
import {
  CancelledError,
  ComponentError,
  ConfigurationError,
  errorMessage,
  MissingStateKey,
  NoMatchingEdge,
  SwitchyardError,
  TimeoutError,
} from "../errors.js";
import { log as rootLog } from "../utils/logger.js";
import { abortable, DeadlineExceeded, type InFlightWork, withTimeout } from "../utils/timeout.js";
import {
  type CapabilityInvoker,
  type Component,
  type EdgeCondition,
  type GraphDefinition,
  type GraphExecutionOptions,
  type GraphExecutionResult,
  type GraphNodeDefinition,
  type PipelineState,
  type StateUpdate,
  TERMINAL,
} from "./types.js";
import { type ComponentLookup, componentOf, validateGraph } from "./validate.js";

const log = rootLog.child("graph");

type BoundNode = {
  def: GraphNodeDefinition;
  component: Component;
};

/**
 * A validated graph bound to its components. Execution walks one path from
 * the entry node: nodes run strictly one after another and each at most once.
 */
export class ComponentGraph {
  readonly name: string;
  readonly definition: GraphDefinition;
  private nodes = new Map<string, BoundNode>();
  private entry: BoundNode;

  constructor(definition: GraphDefinition, components: ComponentLookup) {
    validateGraph(definition, components);
    this.name = definition.name;
    this.definition = definition;

    let entry: BoundNode | undefined;
    for (const def of definition.nodes) {
      const component = components.get(componentOf(def));
      if (!component) {
        throw new ConfigurationError(`Graph "${definition.name}": node "${def.id}" uses unregistered component "${componentOf(def)}"`);
      }
      const bound = { def, component };
      this.nodes.set(def.id, bound);
      if (def.entry) entry = bound;
    }
    if (!entry) throw new ConfigurationError(`Graph "${definition.name}" has no entry node`);
    this.entry = entry;
  }

  /** Capabilities any node of this graph may resolve. */
  requiredCapabilities(): string[] {
    const caps = new Set<string>();
    for (const { component } of this.nodes.values()) {
      for (const cap of component.requires ?? []) caps.add(cap);
    }
    return [...caps];
  }

  async execute(entryPayload: PipelineState, opts: GraphExecutionOptions): Promise<GraphExecutionResult> {
    const start = Date.now();
    const signal = opts.signal ?? new AbortController().signal;
    const state: PipelineState = { ...entryPayload };
    const path: string[] = [];

    let current: BoundNode | undefined = this.entry;
    while (current) {
      // Cancellation is observed between nodes only.
      if (signal.aborted) throw new CancelledError(`Graph "${this.name}"`);

      const { def, component } = current;
      path.push(def.id);
      opts.onNodeStart?.(def.id);
      log.debug(`Running node "${def.id}"`, { graph: this.name, taskId: opts.taskId });

      const update = await runComponent(component, state, {
        nodeId: def.id,
        timeoutMs: def.timeoutMs,
        taskId: opts.taskId,
        signal,
        resolver: opts.resolver,
        inflight: opts.inflight,
      });
      Object.assign(state, update);
      opts.onNodeEnd?.(def.id, update);

      const next = this.nextNode(def, state);
      current = next === TERMINAL ? undefined : this.nodes.get(next);
    }

    return { graph: this.name, state, path, durationMs: Date.now() - start };
  }

  /** First edge whose condition holds, in declaration order. */
  private nextNode(def: GraphNodeDefinition, state: PipelineState): string {
    for (const edge of def.edges) {
      if (!edge.when || evaluateCondition(edge.when, state, def.id)) {
        return edge.to;
      }
    }
    throw new NoMatchingEdge(def.id);
  }
}

export type RunComponentOptions = {
  nodeId: string;
  signal: AbortSignal;
  resolver: CapabilityInvoker;
  timeoutMs?: number;
  taskId?: string;
  /** Receives the component's run when it is abandoned on timeout or cancellation. */
  inflight?: InFlightWork;
};

/**
 * Run one component against a copy of `state` and return its update. Typed
 * errors pass through; anything else becomes a `ComponentError`.
 */
export async function runComponent(
  component: Component,
  state: Readonly<PipelineState>,
  opts: RunComponentOptions,
): Promise<StateUpdate> {
  const { nodeId, signal } = opts;
  for (const key of component.reads ?? []) {
    if (!(key in state)) throw new MissingStateKey(key, nodeId);
  }

  let pending: Promise<StateUpdate> | undefined;
  try {
    pending = component.run({ ...state }, {
      nodeId,
      taskId: opts.taskId,
      signal,
      resolver: opts.resolver,
      inflight: opts.inflight,
      log: log.child(component.name),
    });
    const bounded = opts.timeoutMs !== undefined ? withTimeout(pending, opts.timeoutMs) : pending;
    const update = await abortable(bounded, signal);
    if (signal.aborted) throw new CancelledError(`Node "${nodeId}"`);
    if (typeof update !== "object" || update === null || Array.isArray(update)) {
      throw new ComponentError(component.name, "returned a non-object state update", nodeId);
    }
    return update;
  } catch (err) {
    if (pending) opts.inflight?.add(pending);
    if (signal.aborted) throw new CancelledError(`Node "${nodeId}"`);
    if (err instanceof DeadlineExceeded) throw new TimeoutError(`Node "${nodeId}"`, err.timeoutMs);
    if (err instanceof SwitchyardError) throw err;
    throw new ComponentError(component.name, errorMessage(err), nodeId);
  }
}

export function evaluateCondition(cond: EdgeCondition, state: Readonly<PipelineState>, nodeId: string): boolean {
  if ("test" in cond) {
    for (const key of cond.reads) {
      if (!(key in state)) throw new MissingStateKey(key, nodeId);
    }
    return cond.test(state);
  }
  if ("exists" in cond) {
    return (cond.key in state) === cond.exists;
  }
  if (!(cond.key in state)) throw new MissingStateKey(cond.key, nodeId);
  const value = state[cond.key];
  if ("equals" in cond) return isDeepStrictEqual(value, cond.equals);
  if ("notEquals" in cond) return !isDeepStrictEqual(value, cond.notEquals);
  return Boolean(value) === cond.truthy;
}
