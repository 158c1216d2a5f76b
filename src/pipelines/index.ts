import type { BackendAdapter } from "../backends/adapter.js";
import { MockBackend } from "../backends/mock-backend.js";
import { builtinComponents } from "../components/index.js";
import type { Component, GraphDefinition } from "../graph/types.js";
import { knowledgeQaPipeline } from "./knowledge-qa.js";
import { mailReplyPipeline } from "./mail-reply.js";
import { meetingPipeline } from "./meeting.js";

export { knowledgeQaPipeline } from "./knowledge-qa.js";
export { mailReplyPipeline } from "./mail-reply.js";
export { meetingPipeline } from "./meeting.js";

export const builtinPipelines: readonly GraphDefinition[] = [meetingPipeline, knowledgeQaPipeline, mailReplyPipeline];

/** Capabilities the built-in components resolve. */
export const BUILTIN_CAPABILITIES = ["transcribe-audio", "generate-text", "vector-search", "mail-sync"] as const;

/** Anything components and graphs can be registered on: the registry before build, or a reload draft. */
export type RegistrationTarget = {
  registerComponent(component: Component): unknown;
  registerGraph(definition: GraphDefinition): unknown;
  registerBackend(backend: BackendAdapter): unknown;
};

export function registerBuiltins(target: RegistrationTarget): void {
  for (const component of builtinComponents) target.registerComponent(component);
  for (const pipeline of builtinPipelines) target.registerGraph(pipeline);
}

/**
 * Close each built-in capability chain with a mock fallback, placed after
 * every configured backend. Chains that already end in a fallback are left alone.
 */
export function registerMockFallbacks(target: RegistrationTarget, configured: readonly BackendAdapter[]): MockBackend[] {
  const added: MockBackend[] = [];
  for (const capability of BUILTIN_CAPABILITIES) {
    const chain = configured.filter((b) => b.capability === capability && b.enabled);
    if (chain.some((b) => b.fallback)) continue;
    const priority = chain.reduce((max, b) => Math.max(max, b.priority), 0) + 1000;
    const mock = new MockBackend({ name: `mock-${capability}`, capability, priority });
    target.registerBackend(mock);
    added.push(mock);
  }
  return added;
}
