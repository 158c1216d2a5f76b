import { readFileSync } from "node:fs";
import type { z } from "zod";
import type { BackendAdapter } from "./backends/adapter.js";
import { HttpBackend } from "./backends/http-backend.js";
import { MockBackend } from "./backends/mock-backend.js";
import type { SwitchyardConfigOverrides } from "./config.js";
import { ConfigurationError, errorMessage, ValidationError } from "./errors.js";
import type { EdgeCondition, GraphDefinition } from "./graph/types.js";
import {
  type BackendConfig,
  ConfigFile,
  type EdgeConditionConfig,
  type GraphConfig,
  parseOrThrow,
} from "./schemas.js";

/** Read and validate a JSON config file. */
export function loadConfigFile(path: string): ConfigFile {
  let raw: string;
  try {
    raw = readFileSync(path, "utf8");
  } catch (err) {
    throw new ConfigurationError(`Cannot read config file "${path}": ${errorMessage(err)}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ConfigurationError(`Config file "${path}" is not valid JSON: ${errorMessage(err)}`);
  }
  return parseConfigFile(json, path);
}

export function parseConfigFile(json: unknown, source = "config"): ConfigFile {
  try {
    return parseOrThrow(ConfigFile, json, source);
  } catch (err) {
    if (err instanceof ValidationError) throw new ConfigurationError(err.message);
    throw err;
  }
}

/** The process-wide settings carried by a config file. */
export function toConfigOverrides(file: ConfigFile): SwitchyardConfigOverrides {
  return {
    workers: file.workers,
    timeouts: file.timeouts,
    healthCache: file.healthCache,
    tasks: file.tasks,
    server: file.server,
    store: file.store,
  };
}

export function toBackend(config: BackendConfig): BackendAdapter {
  switch (config.type) {
    case "http":
      return new HttpBackend(config);
    case "mock":
      return new MockBackend(config);
  }
}

export function toGraphDefinition(config: GraphConfig): GraphDefinition {
  return {
    name: config.name,
    description: config.description,
    inputs: config.inputs,
    nodes: config.nodes.map((node) => ({
      id: node.id,
      component: node.component,
      entry: node.entry,
      timeoutMs: node.timeoutMs,
      edges: node.edges.map((edge) => (edge.when ? { to: edge.to, when: toCondition(edge.when) } : { to: edge.to })),
    })),
  };
}

function toCondition(when: z.infer<typeof EdgeConditionConfig>): EdgeCondition {
  if ("truthy" in when) return { key: when.key, truthy: when.truthy };
  if ("exists" in when) return { key: when.key, exists: when.exists };
  if ("notEquals" in when) return { key: when.key, notEquals: when.notEquals };
  if ("equals" in when) return { key: when.key, equals: when.equals };
  throw new ConfigurationError(`Edge condition on "${when.key}" needs one of equals, notEquals, truthy or exists`);
}
