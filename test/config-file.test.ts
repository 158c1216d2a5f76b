import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { afterAll, describe, expect, it } from "vitest";
import { HttpBackend } from "../src/backends/http-backend.js";
import { MockBackend } from "../src/backends/mock-backend.js";
import { loadConfigFile, parseConfigFile, toBackend, toConfigOverrides, toGraphDefinition } from "../src/config-file.js";
import { ConfigurationError } from "../src/errors.js";

const dir = mkdtempSync(join(tmpdir(), "switchyard-config-"));

afterAll(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe("parseConfigFile", () => {
  it("fills in defaults for an empty file", () => {
    expect(parseConfigFile({})).toEqual({
      mockFallbacks: true,
      builtins: true,
      backends: [],
      optionalCapabilities: [],
      graphs: [],
    });
  });

  it("rejects unknown top-level keys", () => {
    expect(() => parseConfigFile({ bogus: 1 })).toThrow(ConfigurationError);
    expect(() => parseConfigFile({ bogus: 1 })).toThrow("Invalid config: Unrecognized key(s) in object: 'bogus'");
  });

  it("names the source and path of a bad value", () => {
    expect(() => parseConfigFile({ workers: { maxWorkers: 0 } }, "sy.json")).toThrow(
      "Invalid sy.json: workers.maxWorkers: Number must be greater than 0",
    );
  });

  it("rejects an edge condition with no test", () => {
    const graph = { name: "g", nodes: [{ id: "a", entry: true, edges: [{ to: "terminal", when: { key: "k" } }] }] };
    expect(() => parseConfigFile({ graphs: [graph] })).toThrow(ConfigurationError);
  });
});

describe("loadConfigFile", () => {
  it("reads and validates a JSON file", () => {
    const path = join(dir, "ok.json");
    writeFileSync(path, JSON.stringify({ server: { port: 6000 }, optionalCapabilities: ["mail-sync"] }));
    const file = loadConfigFile(path);
    expect(file.server).toEqual({ port: 6000 });
    expect(file.optionalCapabilities).toEqual(["mail-sync"]);
  });

  it("accepts the shipped example", () => {
    const file = loadConfigFile(fileURLToPath(new URL("../switchyard.config.example.json", import.meta.url)));
    expect(file.backends.map((b) => b.name)).toEqual(["whisper-local", "llm-local", "llm-remote", "vector-index"]);
    expect(toGraphDefinition(file.graphs[0]).nodes.map((n) => n.id)).toEqual(["summarize", "draft-followup"]);
  });

  it("reports unreadable files and broken JSON", () => {
    const missing = join(dir, "missing.json");
    expect(() => loadConfigFile(missing)).toThrow(`Cannot read config file "${missing}"`);

    const broken = join(dir, "broken.json");
    writeFileSync(broken, "{ nope");
    expect(() => loadConfigFile(broken)).toThrow(`Config file "${broken}" is not valid JSON`);
  });
});

describe("conversions", () => {
  it("builds backends by type", () => {
    const http = toBackend({
      type: "http",
      name: "local-llm",
      capability: "generate-text",
      priority: 10,
      url: "http://127.0.0.1:8080/generate",
    });
    expect(http).toBeInstanceOf(HttpBackend);
    expect(http).toMatchObject({ name: "local-llm", healthUrl: "http://127.0.0.1:8080/generate/health", enabled: true });

    const mock = toBackend({ type: "mock", name: "canned", capability: "vector-search", priority: 99, output: { results: [] } });
    expect(mock).toBeInstanceOf(MockBackend);
    expect(mock.fallback).toBe(true);
  });

  it("converts graph conditions", () => {
    const def = toGraphDefinition({
      name: "g",
      nodes: [
        {
          id: "a",
          entry: true,
          edges: [
            { to: "b", when: { key: "score", equals: 3 } },
            { to: "b", when: { key: "flag", truthy: false } },
            { to: "terminal" },
          ],
        },
        { id: "b", component: "worker", edges: [{ to: "terminal" }] },
      ],
    });
    expect(def.nodes[0].edges).toEqual([
      { to: "b", when: { key: "score", equals: 3 } },
      { to: "b", when: { key: "flag", truthy: false } },
      { to: "terminal" },
    ]);
    expect(def.nodes[1].component).toBe("worker");
  });

  it("carries process settings as overrides", () => {
    const file = parseConfigFile({ workers: { maxWorkers: 8 }, healthCache: { ttlMs: 0 } });
    expect(toConfigOverrides(file)).toMatchObject({ workers: { maxWorkers: 8 }, healthCache: { ttlMs: 0 } });
  });
});
