import { z } from "zod";
import { ComponentError } from "../errors.js";
import type { ComponentContext, PipelineState } from "../graph/types.js";
import type { ResolvedOutput } from "../resolver/resolver.js";

/** Text-producing backends answer either with a bare string or `{ text }`. */
export const TextOutput = z.union([
  z.string(),
  z.object({ text: z.string() }).passthrough(),
]).transform((out) => (typeof out === "string" ? out : out.text));

export type ParsedOutput<T> = {
  value: T;
  resolved: ResolvedOutput;
};

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
    .join("; ");
}

/** Resolve `capability` and check the output's shape before the component uses it. */
export async function invokeParsed<S extends z.ZodTypeAny>(
  ctx: ComponentContext,
  component: string,
  capability: string,
  input: unknown,
  schema: S,
): Promise<ParsedOutput<z.output<S>>> {
  const resolved = await ctx.resolver.invoke(capability, input, {
    signal: ctx.signal,
    taskId: ctx.taskId,
    inflight: ctx.inflight,
  });
  const parsed = schema.safeParse(resolved.output);
  if (!parsed.success) {
    throw new ComponentError(
      component,
      `unexpected output from backend "${resolved.backend}": ${describeIssues(parsed.error)}`,
      ctx.nodeId,
    );
  }
  if (resolved.degraded) {
    ctx.log.warn("Using degraded output", { capability, backend: resolved.backend });
  }
  return { value: parsed.data, resolved };
}

export function generateText(
  ctx: ComponentContext,
  component: string,
  prompt: string,
  system?: string,
): Promise<ParsedOutput<string>> {
  return invokeParsed(ctx, component, "generate-text", system ? { prompt, system } : { prompt }, TextOutput);
}

/** Read a state value that the component's `reads` guarantees is present, checking its type. */
export function readState<S extends z.ZodTypeAny>(
  state: Readonly<PipelineState>,
  key: string,
  schema: S,
  component: string,
): z.output<S> {
  const parsed = schema.safeParse(state[key]);
  if (!parsed.success) {
    throw new ComponentError(component, `state key "${key}" has the wrong shape: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}
