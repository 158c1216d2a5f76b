import type { BackendAdapter } from "../backends/adapter.js";
import { ConfigurationError, type SwitchyardError } from "../errors.js";
import { ComponentGraph } from "../graph/executor.js";
import type { Component, GraphDefinition } from "../graph/types.js";
import { collectGraphIssues } from "../graph/validate.js";
import { HealthMonitor } from "../resolver/health.js";
import { CapabilityResolver } from "../resolver/resolver.js";
import type { TaskKindSource, TaskRunner } from "../tasks/types.js";
import { log as rootLog } from "../utils/logger.js";
import { CAPABILITY_KIND_PREFIX, Catalog, COMPONENT_KIND_PREFIX } from "./catalog.js";

const log = rootLog.child("registry");

/**
 * Mutable set of definitions a catalog is built from. Duplicates are kept
 * here and reported by `build()`, together with every other issue.
 */
export class RegistryDraft {
  readonly backends: BackendAdapter[] = [];
  readonly components: Component[] = [];
  readonly graphs: GraphDefinition[] = [];
  readonly optional = new Set<string>();

  registerBackend(backend: BackendAdapter): this {
    this.backends.push(backend);
    return this;
  }

  registerComponent(component: Component): this {
    this.components.push(component);
    return this;
  }

  registerGraph(definition: GraphDefinition): this {
    this.graphs.push(definition);
    return this;
  }

  /** Allow `capability` to have no enabled backend. */
  markOptional(capability: string): this {
    this.optional.add(capability);
    return this;
  }

  removeBackend(name: string): boolean {
    return removeWhere(this.backends, (b) => b.name === name);
  }

  removeComponent(name: string): boolean {
    return removeWhere(this.components, (c) => c.name === name);
  }

  removeGraph(name: string): boolean {
    return removeWhere(this.graphs, (g) => g.name === name);
  }

  clone(): RegistryDraft {
    const copy = new RegistryDraft();
    copy.backends.push(...this.backends);
    copy.components.push(...this.components);
    copy.graphs.push(...this.graphs);
    for (const cap of this.optional) copy.optional.add(cap);
    return copy;
  }
}

export type ServiceRegistryOptions = {
  /** Shared across every catalog this registry builds. */
  health?: HealthMonitor;
  defaultTimeoutMs?: number;
};

/**
 * Collects backends, components and graphs, validates them as a whole and
 * publishes an immutable `Catalog`. After the first build, definitions change
 * only through `reload()`, which swaps the catalog in one assignment.
 */
export class ServiceRegistry implements TaskKindSource {
  readonly health: HealthMonitor;
  private draft = new RegistryDraft();
  private current?: Catalog;
  private version = 0;
  private defaultTimeoutMs?: number;

  constructor(opts: ServiceRegistryOptions = {}) {
    this.health = opts.health ?? new HealthMonitor();
    this.defaultTimeoutMs = opts.defaultTimeoutMs;
  }

  get ready(): boolean {
    return this.current !== undefined;
  }

  registerBackend(backend: BackendAdapter): this {
    this.assertOpen();
    this.draft.registerBackend(backend);
    return this;
  }

  registerComponent(component: Component): this {
    this.assertOpen();
    this.draft.registerComponent(component);
    return this;
  }

  registerGraph(definition: GraphDefinition): this {
    this.assertOpen();
    this.draft.registerGraph(definition);
    return this;
  }

  markOptional(capability: string): this {
    this.assertOpen();
    this.draft.markOptional(capability);
    return this;
  }

  /** Validate everything registered so far and publish the first catalog. */
  build(): Catalog {
    this.assertOpen();
    const catalog = this.compile(this.draft);
    this.current = catalog;
    log.info("Registry built", summarize(catalog));
    return catalog;
  }

  /**
   * Apply `configure` to a copy of the current definitions and swap in the
   * result. If the new definitions do not build, the live catalog is kept
   * and the error is thrown.
   */
  reload(configure: (draft: RegistryDraft) => void): Catalog {
    if (!this.current) throw new ConfigurationError("Registry has not been built; call build() first");
    const next = this.draft.clone();
    configure(next);
    const catalog = this.compile(next);

    this.draft = next;
    this.current = catalog;
    // Backends may have been replaced under the same name.
    this.health.clear();
    log.info("Registry reloaded", summarize(catalog));
    return catalog;
  }

  catalog(): Catalog {
    if (!this.current) throw new ConfigurationError("Registry has not been built");
    return this.current;
  }

  runnerFor(kind: string): TaskRunner | undefined {
    return this.catalog().runnerFor(kind);
  }

  private assertOpen(): void {
    if (this.current) {
      throw new ConfigurationError("Registry is already built; use reload() to change it");
    }
  }

  private compile(draft: RegistryDraft): Catalog {
    const issues: SwitchyardError[] = [];
    const issue = (msg: string) => issues.push(new ConfigurationError(msg));

    const components = new Map<string, Component>();
    for (const component of draft.components) {
      if (components.has(component.name)) issue(`Component "${component.name}" is registered twice`);
      else components.set(component.name, component);
    }

    const backendNames = new Set<string>();
    for (const backend of draft.backends) {
      if (backendNames.has(backend.name)) issue(`Backend "${backend.name}" is registered twice`);
      backendNames.add(backend.name);
    }

    for (const [capability, chain] of chainsOf(draft.backends)) {
      const priorities = new Map<number, string>();
      chain.forEach((backend, i) => {
        const other = priorities.get(backend.priority);
        if (other !== undefined) {
          issue(`Capability "${capability}": backends "${other}" and "${backend.name}" share priority ${backend.priority}`);
        }
        priorities.set(backend.priority, backend.name);
        if (backend.fallback && i < chain.length - 1) {
          issue(`Capability "${capability}": fallback backend "${backend.name}" must have the lowest priority in its chain`);
        }
      });
    }

    const enabled = new Set(draft.backends.filter((b) => b.enabled).map((b) => b.capability));
    for (const component of components.values()) {
      for (const capability of component.requires ?? []) {
        if (!enabled.has(capability) && !draft.optional.has(capability)) {
          issue(`Component "${component.name}" requires capability "${capability}", which has no enabled backend`);
        }
      }
    }

    const graphNames = new Set<string>();
    for (const def of draft.graphs) {
      if (graphNames.has(def.name)) issue(`Graph "${def.name}" is registered twice`);
      graphNames.add(def.name);
      if (def.name.startsWith(COMPONENT_KIND_PREFIX) || def.name.startsWith(CAPABILITY_KIND_PREFIX)) {
        issue(`Graph "${def.name}" uses a reserved task kind prefix`);
      }
      issues.push(...collectGraphIssues(def, components));
    }

    if (issues.length > 0) {
      throw new ConfigurationError(`Registry build failed with ${issues.length} issue(s)`, issues);
    }

    const graphs = new Map<string, ComponentGraph>();
    for (const def of draft.graphs) graphs.set(def.name, new ComponentGraph(def, components));

    const backends = [...draft.backends];
    return new Catalog({
      version: ++this.version,
      backends,
      components,
      graphs,
      resolver: new CapabilityResolver(backends, { health: this.health, defaultTimeoutMs: this.defaultTimeoutMs }),
    });
  }
}

/** Enabled backends grouped by capability, in the order the resolver tries them. */
function chainsOf(backends: readonly BackendAdapter[]): Map<string, BackendAdapter[]> {
  const chains = new Map<string, BackendAdapter[]>();
  for (const backend of backends) {
    if (!backend.enabled) continue;
    const chain = chains.get(backend.capability) ?? [];
    chain.push(backend);
    chains.set(backend.capability, chain);
  }
  for (const chain of chains.values()) chain.sort((a, b) => a.priority - b.priority);
  return chains;
}

function removeWhere<T>(items: T[], match: (item: T) => boolean): boolean {
  const index = items.findIndex(match);
  if (index === -1) return false;
  items.splice(index, 1);
  return true;
}

function summarize(catalog: Catalog): Record<string, unknown> {
  return {
    version: catalog.version,
    backends: catalog.backends.length,
    components: catalog.components.size,
    graphs: [...catalog.graphs.keys()],
  };
}
