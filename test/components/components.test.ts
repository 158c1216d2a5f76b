import { describe, expect, it } from "vitest";
import { FunctionBackend } from "../../src/backends/function-backend.js";
import { MockBackend } from "../../src/backends/mock-backend.js";
import {
  answer,
  buildAnswerPrompt,
  draftReply,
  needsReply,
  parseSummary,
  retrieve,
  summarize,
  syncMail,
  transcribe,
} from "../../src/components/index.js";
import { ComponentError } from "../../src/errors.js";
import { runComponent } from "../../src/graph/executor.js";
import type { Component, PipelineState } from "../../src/graph/types.js";
import { CapabilityResolver } from "../../src/resolver/resolver.js";

function backend(capability: string, fn: (input: unknown) => unknown, name = `${capability}-test`): FunctionBackend {
  return new FunctionBackend({ name, capability, priority: 1, fn: async (input) => fn(input) });
}

function run(component: Component, state: PipelineState, ...backends: (FunctionBackend | MockBackend)[]) {
  return runComponent(component, state, {
    nodeId: component.name,
    signal: new AbortController().signal,
    resolver: new CapabilityResolver(backends),
  });
}

describe("parseSummary", () => {
  it("splits the summary from its action items", () => {
    const text = "Short summary.\n\nAction items:\n- Send notes\n- Book room\n\nUnrelated trailing line";
    expect(parseSummary(text)).toEqual({ summary: "Short summary.", actionItems: ["Send notes", "Book room"] });
  });

  it("accepts markdown headings and numbered bullets", () => {
    const text = "Went fine.\n**Action Items:**\n1. Update the roadmap\n2) Email finance";
    expect(parseSummary(text).actionItems).toEqual(["Update the roadmap", "Email finance"]);
  });

  it("treats an explicit none as no action items", () => {
    expect(parseSummary("Nothing to do.\nAction items:\n- None.").actionItems).toEqual([]);
  });

  it("uses the whole reply as the summary when there is no action section", () => {
    expect(parseSummary("  Just a recap.  ")).toEqual({ summary: "Just a recap.", actionItems: [] });
  });
});

describe("needsReply", () => {
  const base = { id: "m1", from: "sam@example.com", subject: "Hello" };

  it("looks for a question in the body, then the subject", () => {
    expect(needsReply({ ...base, body: "Can you join?" })).toBe(true);
    expect(needsReply({ ...base, body: "Thanks, all done." })).toBe(false);
    expect(needsReply({ ...base, subject: "Lunch?" })).toBe(true);
  });

  it("defers to an explicit flag from the backend", () => {
    expect(needsReply({ ...base, body: "Rhetorical?", needsReply: false })).toBe(false);
    expect(needsReply({ ...base, body: "FYI", needsReply: true })).toBe(true);
  });
});

describe("buildAnswerPrompt", () => {
  it("numbers passages and names their sources", () => {
    expect(buildAnswerPrompt("Why?", [{ text: "Because.", source: "faq" }, { text: "Also this." }])).toBe(
      "Answer the question using only the passages below. Cite passages by number.\n\n" +
        "[1] (faq) Because.\n[2] Also this.\n\nQuestion: Why?",
    );
  });

  it("admits when nothing was found", () => {
    expect(buildAnswerPrompt("Why?", [])).toBe(
      "Answer the question. No reference passages were found; say so if unsure.\n\nQuestion: Why?",
    );
  });
});

describe("built-in components", () => {
  it("transcribe passes the language along and records the backend", async () => {
    const seen: unknown[] = [];
    const update = await run(
      transcribe,
      { "meeting.audioPath": "/tmp/standup.wav", "meeting.language": "en" },
      backend("transcribe-audio", (input) => {
        seen.push(input);
        return "hello everyone";
      }, "local-asr"),
    );
    expect(seen).toEqual([{ audioPath: "/tmp/standup.wav", language: "en" }]);
    expect(update).toEqual({ "meeting.transcript": "hello everyone", "meeting.transcriptBackend": "local-asr" });
  });

  it("transcribe rejects a state value of the wrong type", async () => {
    await expect(
      run(transcribe, { "meeting.audioPath": 42 }, backend("transcribe-audio", () => "x")),
    ).rejects.toBeInstanceOf(ComponentError);
  });

  it("summarize writes the summary and the action-item flag", async () => {
    const update = await run(
      summarize,
      { "meeting.transcript": "We talked." },
      backend("generate-text", () => ({ text: "Talked.\nAction items:\n- Follow up" })),
    );
    expect(update).toEqual({
      "meeting.summary": "Talked.",
      "meeting.actionItems": ["Follow up"],
      "meeting.hasActionItems": true,
    });
  });

  it("retrieve limits passages to topK", async () => {
    const calls: unknown[] = [];
    const update = await run(
      retrieve,
      { "knowledge.query": "capital", "knowledge.topK": 1 },
      backend("vector-search", (input) => {
        calls.push(input);
        return { results: [{ text: "one", score: 0.9 }, { text: "two", score: 0.5 }] };
      }),
    );
    expect(calls).toEqual([{ query: "capital", topK: 1 }]);
    expect(update).toEqual({ "knowledge.passages": [{ text: "one", score: 0.9 }] });
  });

  it("rejects backend output of the wrong shape", async () => {
    const err = await run(
      retrieve,
      { "knowledge.query": "capital" },
      backend("vector-search", () => ({ hits: [] }), "index"),
    ).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ComponentError);
    expect(err).toMatchObject({
      message: 'Component "retrieve" failed: unexpected output from backend "index": results: Required',
    });
  });

  it("answer accepts degraded output from a fallback", async () => {
    const update = await run(
      answer,
      { "knowledge.query": "q", "knowledge.passages": [] },
      new MockBackend({ name: "mock", capability: "generate-text", priority: 9 }),
    );
    expect(update).toEqual({ "knowledge.answer": "[language model unavailable]" });
  });

  it("sync-mail flags whether any message needs a reply", async () => {
    const update = await run(
      syncMail,
      { "mail.since": "2026-01-01" },
      backend("mail-sync", (input) => ({
        messages: [{ id: "1", from: "a@example.com", subject: "Hi", body: "Any news?" }],
        echo: input,
      })),
    );
    expect(update["mail.needsReply"]).toBe(true);
    expect(update["mail.messages"]).toEqual([{ id: "1", from: "a@example.com", subject: "Hi", body: "Any news?" }]);
  });

  it("draft-reply answers the first message that needs one", async () => {
    const prompts: unknown[] = [];
    const update = await run(
      draftReply,
      {
        "mail.messages": [
          { id: "1", from: "a@example.com", subject: "FYI", body: "No action needed." },
          { id: "2", from: "b@example.com", subject: "Thursday", body: "Are you free?" },
        ],
      },
      backend("generate-text", (input) => {
        prompts.push(input);
        return "Yes, I am.";
      }),
    );
    expect(update).toEqual({ "mail.draft": "Yes, I am.", "mail.replyTo": "2" });
    expect(prompts).toEqual([
      {
        prompt: "Draft a concise, polite reply to this email.\nFrom: b@example.com\nSubject: Thursday\n\nAre you free?",
      },
    ]);
  });

  it("draft-reply fails when no message needs a reply", async () => {
    await expect(
      run(draftReply, { "mail.messages": [] }, backend("generate-text", () => "unused")),
    ).rejects.toThrow('Component "draft-reply" failed: no message needs a reply');
  });
});
