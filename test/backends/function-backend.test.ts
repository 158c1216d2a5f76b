import { describe, expect, it } from "vitest";
import { FunctionBackend } from "../../src/backends/function-backend.js";

const ctx = () => ({ signal: new AbortController().signal, capability: "generate-text" });

describe("FunctionBackend", () => {
  it("invokes the function with input and context", async () => {
    let seen: unknown;
    const backend = new FunctionBackend({
      name: "echo",
      capability: "generate-text",
      priority: 1,
      fn: async (input, c) => {
        seen = c.capability;
        return { text: `echoed: ${String(input)}` };
      },
    });

    await expect(backend.invoke("hello", ctx())).resolves.toEqual({ text: "echoed: hello" });
    expect(seen).toBe("generate-text");
  });

  it("defaults to enabled, non-fallback and healthy", async () => {
    const backend = new FunctionBackend({ name: "f", capability: "c", priority: 0, fn: async () => null });
    expect(backend.enabled).toBe(true);
    expect(backend.fallback).toBe(false);
    expect(backend.type).toBe("function");
    await expect(backend.health()).resolves.toBe(true);
  });

  it("uses the supplied health probe", async () => {
    const backend = new FunctionBackend({
      name: "f",
      capability: "c",
      priority: 0,
      fn: async () => null,
      healthFn: async () => false,
    });
    await expect(backend.health()).resolves.toBe(false);
  });

  it("propagates errors when retries are off", async () => {
    let calls = 0;
    const backend = new FunctionBackend({
      name: "failing",
      capability: "c",
      priority: 0,
      fn: async () => {
        calls++;
        throw new Error("boom");
      },
    });
    await expect(backend.invoke(null, ctx())).rejects.toThrow("boom");
    expect(calls).toBe(1);
  });

  it("retries up to the configured number of extra attempts", async () => {
    let calls = 0;
    const backend = new FunctionBackend({
      name: "flaky",
      capability: "c",
      priority: 0,
      retries: 2,
      retryDelayMs: 1,
      fn: async () => {
        calls++;
        if (calls < 3) throw new Error(`attempt ${calls}`);
        return "ok";
      },
    });
    await expect(backend.invoke(null, ctx())).resolves.toBe("ok");
    expect(calls).toBe(3);
  });

  it("gives up after the last retry", async () => {
    let calls = 0;
    const backend = new FunctionBackend({
      name: "down",
      capability: "c",
      priority: 0,
      retries: 1,
      retryDelayMs: 1,
      fn: async () => {
        calls++;
        throw new Error(`attempt ${calls}`);
      },
    });
    await expect(backend.invoke(null, ctx())).rejects.toThrow("attempt 2");
    expect(calls).toBe(2);
  });
});
