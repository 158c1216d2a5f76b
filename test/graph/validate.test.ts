import { describe, expect, it } from "vitest";
import { ConfigurationError, GraphCycleError } from "../../src/errors.js";
import { type Component, type GraphDefinition, TERMINAL } from "../../src/graph/types.js";
import { collectGraphIssues, findCycle, topologicalOrder, validateGraph } from "../../src/graph/validate.js";

function component(name: string, reads: string[] = [], writes: string[] = []): Component {
  return { name, reads, writes, run: async () => ({}) };
}

function registry(...components: Component[]): Map<string, Component> {
  return new Map(components.map((c) => [c.name, c]));
}

const linear: GraphDefinition = {
  name: "linear",
  nodes: [
    { id: "a", entry: true, edges: [{ to: "b" }] },
    { id: "b", edges: [{ to: TERMINAL }] },
  ],
};

function messages(def: GraphDefinition, components?: Map<string, Component>): string[] {
  return collectGraphIssues(def, components).map((e) => e.message);
}

describe("validateGraph", () => {
  it("accepts a well-formed graph", () => {
    expect(() => validateGraph(linear, registry(component("a"), component("b")))).not.toThrow();
  });

  it("requires exactly one entry node", () => {
    const none: GraphDefinition = { name: "g", nodes: [{ id: "a", edges: [{ to: TERMINAL }] }] };
    const two: GraphDefinition = {
      name: "g",
      nodes: [
        { id: "a", entry: true, edges: [{ to: TERMINAL }] },
        { id: "b", entry: true, edges: [{ to: TERMINAL }] },
      ],
    };
    expect(messages(none)).toEqual(['Graph "g": expected exactly one entry node, found 0']);
    expect(messages(two)).toEqual(['Graph "g": expected exactly one entry node, found 2']);
  });

  it("rejects duplicate ids, unknown targets and dead-end nodes", () => {
    const def: GraphDefinition = {
      name: "g",
      nodes: [
        { id: "a", entry: true, edges: [{ to: "missing" }] },
        { id: "a", edges: [{ to: TERMINAL }] },
        { id: "c", edges: [] },
      ],
    };
    expect(messages(def)).toEqual([
      'Graph "g": duplicate node "a"',
      'Graph "g": node "a" has an edge to unknown node "missing"',
      'Graph "g": node "c" has no outgoing edges (route it to "terminal")',
    ]);
  });

  it("requires an unconditional edge to come last", () => {
    const def: GraphDefinition = {
      name: "g",
      nodes: [
        { id: "a", entry: true, edges: [{ to: TERMINAL }, { to: "b", when: { key: "x", truthy: true } }] },
        { id: "b", edges: [{ to: TERMINAL }] },
      ],
    };
    expect(messages(def)).toEqual(['Graph "g": node "a" has an unconditional edge before its last edge']);
  });

  it("reports a cycle alone, naming its nodes", () => {
    const def: GraphDefinition = {
      name: "loop",
      nodes: [
        { id: "a", entry: true, edges: [{ to: "b" }] },
        { id: "b", edges: [{ to: "c" }] },
        { id: "c", edges: [{ to: "a", when: { key: "again", truthy: true } }, { to: TERMINAL }] },
      ],
    };
    expect(findCycle(def)).toEqual(["a", "b", "c", "a"]);

    const issues = collectGraphIssues(def);
    expect(issues).toHaveLength(1);
    expect(issues[0]).toBeInstanceOf(GraphCycleError);
    expect(() => validateGraph(def)).toThrow(GraphCycleError);
    expect(() => validateGraph(def)).toThrow('Graph "loop" contains a cycle: a -> b -> c -> a');
  });

  it("rejects nodes unreachable from the entry", () => {
    const def: GraphDefinition = {
      name: "g",
      nodes: [
        { id: "a", entry: true, edges: [{ to: TERMINAL }] },
        { id: "orphan", edges: [{ to: TERMINAL }] },
      ],
    };
    expect(messages(def)).toEqual(['Graph "g": node "orphan" is unreachable from entry "a"']);
  });

  it("requires every node's component to be registered", () => {
    expect(messages(linear, registry(component("a")))).toEqual([
      'Graph "linear": node "b" uses unregistered component "b"',
    ]);
  });

  it("resolves components by explicit name before node id", () => {
    const def: GraphDefinition = {
      name: "g",
      nodes: [{ id: "first", component: "worker", entry: true, edges: [{ to: TERMINAL }] }],
    };
    expect(messages(def, registry(component("worker")))).toEqual([]);
  });

  it("checks that condition keys are written on every path to the edge", () => {
    const def: GraphDefinition = {
      name: "branchy",
      nodes: [
        { id: "start", entry: true, edges: [{ to: "left", when: { key: "go.left", truthy: true } }, { to: "right" }] },
        { id: "left", edges: [{ to: "join" }] },
        { id: "right", edges: [{ to: "join" }] },
        { id: "join", edges: [{ to: "done", when: { key: "side.value", exists: true } }, { to: "check" }] },
        { id: "check", edges: [{ to: "done", when: { key: "left.only", equals: 1 } }, { to: TERMINAL }] },
        { id: "done", edges: [{ to: TERMINAL }] },
      ],
    };
    const components = registry(
      component("start", [], ["go.left"]),
      component("left", [], ["side.value", "left.only"]),
      component("right", [], ["side.value"]),
      component("join"),
      component("check"),
      component("done", ["side.value"]),
    );
    // `exists` needs no key; `left.only` is missing on the right-hand path.
    expect(messages(def, components)).toEqual([
      'Graph "branchy": edge "check" -> "done" reads "left.only", which is not guaranteed to be written upstream',
    ]);
  });

  it("checks component reads against graph inputs and upstream writes", () => {
    const def: GraphDefinition = { ...linear, inputs: ["in"] };
    const ok = registry(component("a", ["in"], ["mid"]), component("b", ["mid"]));
    const bad = registry(component("a", ["in"]), component("b", ["mid"]));
    expect(messages(def, ok)).toEqual([]);
    expect(messages(def, bad)).toEqual([
      'Graph "linear": component "b" at node "b" reads "mid", which is not guaranteed to be written before it',
    ]);
  });

  it("checks predicate conditions through their declared reads", () => {
    const def: GraphDefinition = {
      name: "g",
      nodes: [
        { id: "a", entry: true, edges: [{ to: "b", when: { reads: ["score"], test: (s) => s.score === 1 } }, { to: TERMINAL }] },
        { id: "b", edges: [{ to: TERMINAL }] },
      ],
    };
    expect(messages(def, registry(component("a"), component("b")))).toEqual([
      'Graph "g": edge "a" -> "b" reads "score", which is not guaranteed to be written upstream',
    ]);
  });

  it("throws one ConfigurationError carrying every issue", () => {
    const def: GraphDefinition = {
      name: "g",
      nodes: [
        { id: "a", edges: [{ to: "x" }] },
        { id: "b", edges: [{ to: "y" }] },
      ],
    };
    let caught: unknown;
    try {
      validateGraph(def);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigurationError);
    if (!(caught instanceof ConfigurationError)) return;
    expect(caught.issues).toHaveLength(3);
    expect(caught.message.split("\n")[0]).toBe('Graph "g" is invalid:');
  });

  it("orders reachable nodes topologically", () => {
    const def: GraphDefinition = {
      name: "g",
      nodes: [
        { id: "c", edges: [{ to: TERMINAL }] },
        { id: "b", edges: [{ to: "c" }] },
        { id: "a", entry: true, edges: [{ to: "c", when: { key: "k", truthy: true } }, { to: "b" }] },
      ],
    };
    expect(topologicalOrder(def, "a").map((n) => n.id)).toEqual(["a", "b", "c"]);
  });
});
