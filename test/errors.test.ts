import { describe, expect, it } from "vitest";
import {
  AllBackendsFailed,
  ConfigurationError,
  fromTaskError,
  MissingStateKey,
  SwitchyardError,
  toTaskError,
} from "../src/errors.js";

describe("errors", () => {
  it("summarize every failed backend", () => {
    const err = new AllBackendsFailed("generate-text", [
      { backend: "gpu", kind: "BackendUnhealthy", message: "down" },
      { backend: "cloud", kind: "BackendTimeout", message: "slow" },
    ]);
    expect(err.message).toBe('All backends failed for "generate-text" (gpu: down; cloud: slow)');
    expect(err.toJSON().details).toMatchObject({ capability: "generate-text" });
  });

  it("list configuration issues under the headline", () => {
    const err = new ConfigurationError("Registry build failed with 2 issue(s)", [
      new ConfigurationError("first"),
      new ConfigurationError("second"),
    ]);
    expect(err.message).toBe("Registry build failed with 2 issue(s):\n  - first\n  - second");
    expect(new ConfigurationError("plain").toJSON()).toEqual({ kind: "ConfigurationError", message: "plain" });
  });

  it("record typed errors as they are and anything else as a component failure", () => {
    expect(toTaskError(new MissingStateKey("k", "n"))).toEqual({
      kind: "MissingStateKey",
      message: 'State key "k" is missing at node "n"',
      details: { key: "k", nodeId: "n" },
    });
    expect(toTaskError(new Error("boom"))).toEqual({ kind: "ComponentError", message: "boom" });
    expect(toTaskError("raw")).toEqual({ kind: "ComponentError", message: "raw" });
  });

  it("rebuild a throwable from a recorded error", () => {
    const err = fromTaskError({ kind: "Timeout", message: "late", details: { timeoutMs: 5 } });
    expect(err).toBeInstanceOf(SwitchyardError);
    expect(err.name).toBe("Timeout");
    expect(err.toJSON()).toEqual({ kind: "Timeout", message: "late", details: { timeoutMs: 5 } });
  });
});
