import type { BackendAdapter } from "../backends/adapter.js";
import { type ComponentGraph, runComponent } from "../graph/executor.js";
import type { Component } from "../graph/types.js";
import type { CapabilityResolver } from "../resolver/resolver.js";
import { parseOrThrow, PipelinePayload } from "../schemas.js";
import type { TaskKindSource, TaskRunner } from "../tasks/types.js";

export const COMPONENT_KIND_PREFIX = "component:";
export const CAPABILITY_KIND_PREFIX = "capability:";

export type CatalogParts = {
  version: number;
  backends: readonly BackendAdapter[];
  components: ReadonlyMap<string, Component>;
  graphs: ReadonlyMap<string, ComponentGraph>;
  resolver: CapabilityResolver;
};

/**
 * Immutable result of a registry build. A task binds to the catalog that was
 * live when it started and keeps it until it finishes.
 */
export class Catalog implements TaskKindSource {
  readonly version: number;
  readonly builtAt = Date.now();
  readonly backends: readonly BackendAdapter[];
  readonly components: ReadonlyMap<string, Component>;
  readonly graphs: ReadonlyMap<string, ComponentGraph>;
  readonly resolver: CapabilityResolver;

  constructor(parts: CatalogParts) {
    this.version = parts.version;
    this.backends = parts.backends;
    this.components = parts.components;
    this.graphs = parts.graphs;
    this.resolver = parts.resolver;
  }

  /** Every task kind this catalog can run. */
  kinds(): string[] {
    return [
      ...this.graphs.keys(),
      ...[...this.components.keys()].map((name) => `${COMPONENT_KIND_PREFIX}${name}`),
      ...this.resolver.capabilities().map((cap) => `${CAPABILITY_KIND_PREFIX}${cap}`),
    ];
  }

  runnerFor(kind: string): TaskRunner | undefined {
    const graph = this.graphs.get(kind);
    if (graph) {
      return async (payload, ctx) => {
        const state = parseOrThrow(PipelinePayload, payload ?? {}, `payload for graph "${graph.name}"`);
        return graph.execute(state, {
          resolver: this.resolver,
          taskId: ctx.taskId,
          signal: ctx.signal,
          inflight: ctx.inflight,
        });
      };
    }

    if (kind.startsWith(COMPONENT_KIND_PREFIX)) {
      const component = this.components.get(kind.slice(COMPONENT_KIND_PREFIX.length));
      if (!component) return undefined;
      return async (payload, ctx) => {
        const state = parseOrThrow(PipelinePayload, payload ?? {}, `payload for component "${component.name}"`);
        const update = await runComponent(component, state, {
          nodeId: component.name,
          taskId: ctx.taskId,
          signal: ctx.signal,
          resolver: this.resolver,
          inflight: ctx.inflight,
        });
        return { ...state, ...update };
      };
    }

    if (kind.startsWith(CAPABILITY_KIND_PREFIX)) {
      const capability = kind.slice(CAPABILITY_KIND_PREFIX.length);
      if (this.resolver.chain(capability).length === 0) return undefined;
      return async (payload, ctx) =>
        this.resolver.invoke(capability, payload, { signal: ctx.signal, taskId: ctx.taskId, inflight: ctx.inflight });
    }

    return undefined;
  }
}
