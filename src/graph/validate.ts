import { ConfigurationError, GraphCycleError, type SwitchyardError } from "../errors.js";
import { type Component, type EdgeCondition, type GraphDefinition, type GraphNodeDefinition, TERMINAL } from "./types.js";

export type ComponentLookup = Pick<ReadonlyMap<string, Component>, "get">;

export function componentOf(node: GraphNodeDefinition): string {
  return node.component ?? node.id;
}

/** State keys a condition needs present to be evaluated. `exists` checks need none. */
export function conditionKeys(cond: EdgeCondition): readonly string[] {
  if ("test" in cond) return cond.reads;
  if ("exists" in cond) return [];
  return [cond.key];
}

/**
 * Check a graph definition. Returns every problem found; an empty list means
 * the graph can be executed. A cycle is reported alone, since reachability
 * and key-flow analysis assume a DAG.
 *
 * With `components`, node components must be registered, and every key read
 * by a component or an edge condition must be guaranteed written on every
 * path that reaches it (graph inputs plus upstream `writes`). Predicates that
 * declare no `reads` are not checked.
 */
export function collectGraphIssues(def: GraphDefinition, components?: ComponentLookup): SwitchyardError[] {
  const issues: SwitchyardError[] = [];
  const issue = (msg: string) => issues.push(new ConfigurationError(`Graph "${def.name}": ${msg}`));

  if (def.nodes.length === 0) {
    issue("has no nodes");
    return issues;
  }

  const ids = new Set<string>();
  for (const node of def.nodes) {
    if (node.id === TERMINAL) issue(`node id "${TERMINAL}" is reserved`);
    if (ids.has(node.id)) issue(`duplicate node "${node.id}"`);
    ids.add(node.id);
  }

  const entries = def.nodes.filter((n) => n.entry === true);
  if (entries.length !== 1) {
    issue(`expected exactly one entry node, found ${entries.length}`);
  }

  for (const node of def.nodes) {
    if (node.edges.length === 0) issue(`node "${node.id}" has no outgoing edges (route it to "${TERMINAL}")`);
    node.edges.forEach((edge, i) => {
      if (edge.to !== TERMINAL && !ids.has(edge.to)) {
        issue(`node "${node.id}" has an edge to unknown node "${edge.to}"`);
      }
      if (!edge.when && i < node.edges.length - 1) {
        issue(`node "${node.id}" has an unconditional edge before its last edge`);
      }
    });
  }
  if (issues.length > 0) return issues;

  const cycle = findCycle(def);
  if (cycle) return [new GraphCycleError(def.name, cycle)];

  const entry = entries[0];
  const reachable = reachableFrom(def, entry.id);
  for (const node of def.nodes) {
    if (!reachable.has(node.id)) issue(`node "${node.id}" is unreachable from entry "${entry.id}"`);
  }

  if (!components) return issues;

  for (const node of def.nodes) {
    if (!components.get(componentOf(node))) {
      issue(`node "${node.id}" uses unregistered component "${componentOf(node)}"`);
    }
  }
  if (issues.length > 0) return issues;

  const guaranteed = guaranteedKeys(def, entry.id, components);
  for (const node of def.nodes) {
    const flow = guaranteed.get(node.id);
    if (!flow) continue;
    const component = components.get(componentOf(node));
    for (const key of component?.reads ?? []) {
      if (!flow.before.has(key)) {
        issue(`component "${componentOf(node)}" at node "${node.id}" reads "${key}", which is not guaranteed to be written before it`);
      }
    }
    for (const edge of node.edges) {
      if (!edge.when) continue;
      for (const key of conditionKeys(edge.when)) {
        if (!flow.after.has(key)) {
          issue(`edge "${node.id}" -> "${edge.to}" reads "${key}", which is not guaranteed to be written upstream`);
        }
      }
    }
  }

  return issues;
}

/** Throw if the graph is invalid: the cycle error itself, or one error carrying every issue. */
export function validateGraph(def: GraphDefinition, components?: ComponentLookup): void {
  const issues = collectGraphIssues(def, components);
  if (issues.length === 0) return;
  if (issues.length === 1) throw issues[0];
  throw new ConfigurationError(`Graph "${def.name}" is invalid`, issues);
}

function successors(node: GraphNodeDefinition): string[] {
  return node.edges.map((e) => e.to).filter((to) => to !== TERMINAL);
}

/** Detect a cycle using DFS with coloring. Returns the cycle path, closed on its first node. */
export function findCycle(def: GraphDefinition): string[] | undefined {
  const WHITE = 0, GRAY = 1, BLACK = 2;
  const nodeMap = new Map(def.nodes.map((n) => [n.id, n]));
  const color = new Map<string, number>();
  for (const node of def.nodes) color.set(node.id, WHITE);
  const stack: string[] = [];

  function dfs(id: string): string[] | undefined {
    color.set(id, GRAY);
    stack.push(id);
    const node = nodeMap.get(id);
    for (const next of node ? successors(node) : []) {
      const c = color.get(next);
      if (c === GRAY) {
        // back edge = cycle
        return [...stack.slice(stack.indexOf(next)), next];
      }
      if (c === WHITE) {
        const found = dfs(next);
        if (found) return found;
      }
    }
    stack.pop();
    color.set(id, BLACK);
    return undefined;
  }

  for (const node of def.nodes) {
    if (color.get(node.id) === WHITE) {
      const found = dfs(node.id);
      if (found) return found;
    }
  }
  return undefined;
}

export function reachableFrom(def: GraphDefinition, start: string): Set<string> {
  const nodeMap = new Map(def.nodes.map((n) => [n.id, n]));
  const seen = new Set<string>();
  const queue = [start];
  while (queue.length > 0) {
    const id = queue.shift();
    if (id === undefined || seen.has(id)) continue;
    seen.add(id);
    const node = nodeMap.get(id);
    if (node) queue.push(...successors(node));
  }
  return seen;
}

/** Reachable nodes in topological order (Kahn). Assumes no cycle. */
export function topologicalOrder(def: GraphDefinition, entry: string): GraphNodeDefinition[] {
  const reachable = reachableFrom(def, entry);
  const nodes = def.nodes.filter((n) => reachable.has(n.id));
  const indegree = new Map<string, number>(nodes.map((n) => [n.id, 0]));
  for (const node of nodes) {
    for (const next of new Set(successors(node))) {
      indegree.set(next, (indegree.get(next) ?? 0) + 1);
    }
  }

  const nodeMap = new Map(nodes.map((n) => [n.id, n]));
  const queue = nodes.filter((n) => indegree.get(n.id) === 0);
  const sorted: GraphNodeDefinition[] = [];
  while (queue.length > 0) {
    const node = queue.shift();
    if (!node) break;
    sorted.push(node);
    for (const next of new Set(successors(node))) {
      const remaining = (indegree.get(next) ?? 0) - 1;
      indegree.set(next, remaining);
      const target = nodeMap.get(next);
      if (remaining === 0 && target) queue.push(target);
    }
  }
  return sorted;
}

type KeyFlow = { before: Set<string>; after: Set<string> };

/**
 * Must-analysis over the DAG: a key is guaranteed before a node when every
 * predecessor guarantees it after itself.
 */
function guaranteedKeys(def: GraphDefinition, entry: string, components: ComponentLookup): Map<string, KeyFlow> {
  const flows = new Map<string, KeyFlow>();
  const incoming = new Map<string, Set<string>[]>();

  for (const node of topologicalOrder(def, entry)) {
    const before = node.id === entry
      ? new Set(def.inputs ?? [])
      : intersect(incoming.get(node.id) ?? []);
    const after = new Set(before);
    for (const key of components.get(componentOf(node))?.writes ?? []) after.add(key);
    flows.set(node.id, { before, after });

    for (const next of new Set(successors(node))) {
      const list = incoming.get(next) ?? [];
      list.push(after);
      incoming.set(next, list);
    }
  }
  return flows;
}

function intersect(sets: Set<string>[]): Set<string> {
  if (sets.length === 0) return new Set();
  const [first, ...rest] = sets;
  return new Set([...first].filter((key) => rest.every((s) => s.has(key))));
}
