import type { BackendAdapter, BackendDescriptorOptions } from "./adapter.js";

export type MockBackendOptions = Omit<BackendDescriptorOptions, "fallback"> & {
  /** Fixed output, or a function of the input. */
  output?: unknown;
  respond?: (input: unknown) => unknown;
  /** Defaults to true: a mock normally closes a chain. */
  fallback?: boolean;
};

/**
 * Last-resort backend for when every real provider is down. It answers
 * instantly and never reports unhealthy.
 */
export class MockBackend implements BackendAdapter {
  readonly name: string;
  readonly type = "mock" as const;
  readonly capability: string;
  readonly priority: number;
  readonly enabled: boolean;
  readonly fallback: boolean;
  readonly timeoutMs?: number;
  readonly description?: string;

  private respond: (input: unknown) => unknown;

  constructor(opts: MockBackendOptions) {
    this.name = opts.name;
    this.capability = opts.capability;
    this.priority = opts.priority;
    this.enabled = opts.enabled ?? true;
    this.fallback = opts.fallback ?? true;
    this.timeoutMs = opts.timeoutMs;
    this.description = opts.description ?? `Mock ${opts.capability} backend`;
    const fixed = opts.output;
    this.respond = opts.respond ?? ((input) => fixed ?? defaultMockOutput(opts.capability, input));
  }

  async health(): Promise<boolean> {
    return true;
  }

  async invoke(input: unknown): Promise<unknown> {
    return this.respond(input);
  }
}

/** Placeholder outputs shaped like what the built-in components expect. */
export function defaultMockOutput(capability: string, input: unknown): unknown {
  switch (capability) {
    case "transcribe-audio":
      return { text: "[transcription unavailable]" };
    case "generate-text":
      return { text: "[language model unavailable]" };
    case "vector-search":
      return { results: [] };
    case "mail-sync":
      return { messages: [] };
    default:
      return { echo: input };
  }
}
