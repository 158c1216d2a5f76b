import { z } from "zod";
import { ValidationError } from "./errors.js";

/** Payload for graph and component tasks: the initial pipeline state. */
export const PipelinePayload = z.record(z.string(), z.unknown());

export const SubmitTaskRequest = z.object({
  kind: z.string().min(1),
  payload: z.unknown().optional(),
});
export type SubmitTaskRequest = z.infer<typeof SubmitTaskRequest>;

export const RunSyncRequest = SubmitTaskRequest.extend({
  timeoutMs: z.number().int().positive().optional(),
});
export type RunSyncRequest = z.infer<typeof RunSyncRequest>;

export const TaskStatusSchema = z.enum(["pending", "running", "succeeded", "failed", "cancelled"]);

export const ListTasksQuery = z.object({
  status: TaskStatusSchema.optional(),
  limit: z.coerce.number().int().positive().optional(),
});

export const ReapQuery = z.object({
  maxAgeMs: z.coerce.number().int().nonnegative().optional(),
});

// --- Config file ---

const BackendBase = z.object({
  name: z.string().min(1),
  capability: z.string().min(1),
  priority: z.number().int(),
  enabled: z.boolean().optional(),
  fallback: z.boolean().optional(),
  timeoutMs: z.number().int().positive().optional(),
  description: z.string().optional(),
});

export const BackendConfig = z.discriminatedUnion("type", [
  BackendBase.extend({
    type: z.literal("http"),
    url: z.string().url(),
    healthUrl: z.string().url().optional(),
    headers: z.record(z.string(), z.string()).optional(),
  }),
  BackendBase.extend({
    type: z.literal("mock"),
    output: z.unknown().optional(),
  }),
]);
export type BackendConfig = z.infer<typeof BackendConfig>;

export const EdgeConditionConfig = z.union([
  z.object({ key: z.string().min(1), equals: z.unknown() }).strict(),
  z.object({ key: z.string().min(1), notEquals: z.unknown() }).strict(),
  z.object({ key: z.string().min(1), truthy: z.boolean() }).strict(),
  z.object({ key: z.string().min(1), exists: z.boolean() }).strict(),
]).refine((cond) => ["equals", "notEquals", "truthy", "exists"].some((test) => test in cond), {
  message: "Edge condition needs one of equals, notEquals, truthy or exists",
});

export const GraphConfig = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  inputs: z.array(z.string()).optional(),
  nodes: z.array(z.object({
    id: z.string().min(1),
    component: z.string().optional(),
    entry: z.boolean().optional(),
    timeoutMs: z.number().int().positive().optional(),
    edges: z.array(z.object({
      to: z.string().min(1),
      when: EdgeConditionConfig.optional(),
    })),
  })).min(1),
});
export type GraphConfig = z.infer<typeof GraphConfig>;

const positiveInt = z.number().int().positive();

export const ConfigFile = z.object({
  workers: z.object({ maxWorkers: positiveInt }).partial().optional(),
  timeouts: z.object({
    healthCheck: positiveInt,
    backendDefault: positiveInt,
    runSync: positiveInt,
  }).partial().optional(),
  healthCache: z.object({ ttlMs: z.number().int().nonnegative() }).partial().optional(),
  tasks: z.object({
    retentionMs: positiveInt,
    reapIntervalMs: positiveInt,
    listLimit: positiveInt,
  }).partial().optional(),
  server: z.object({
    port: z.number().int().min(0).max(65535),
    host: z.string().min(1),
  }).partial().optional(),
  store: z.object({ path: z.string().min(1) }).partial().optional(),
  /** Close every built-in capability chain with a mock fallback. */
  mockFallbacks: z.boolean().default(true),
  /** Register the built-in components and pipelines. */
  builtins: z.boolean().default(true),
  backends: z.array(BackendConfig).default([]),
  optionalCapabilities: z.array(z.string()).default([]),
  graphs: z.array(GraphConfig).default([]),
}).strict();
export type ConfigFile = z.infer<typeof ConfigFile>;

/** Parse `value` or throw a `ValidationError` listing every issue. */
export function parseOrThrow<S extends z.ZodTypeAny>(schema: S, value: unknown, what: string): z.infer<S> {
  const result = schema.safeParse(value);
  if (result.success) return result.data;
  const issues = result.error.issues
    .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
    .join("; ");
  throw new ValidationError(`Invalid ${what}: ${issues}`);
}
