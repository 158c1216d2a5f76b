import { z } from "zod";
import type { Component } from "../graph/types.js";
import { generateText, invokeParsed, readState, TextOutput } from "./support.js";

export const transcribe: Component = {
  name: "transcribe",
  description: "Transcribe a meeting recording",
  reads: ["meeting.audioPath"],
  writes: ["meeting.transcript", "meeting.transcriptBackend"],
  requires: ["transcribe-audio"],

  async run(state, ctx) {
    const audioPath = readState(state, "meeting.audioPath", z.string().min(1), this.name);
    const language = readState(state, "meeting.language", z.string().optional(), this.name);
    const { value, resolved } = await invokeParsed(
      ctx,
      this.name,
      "transcribe-audio",
      language ? { audioPath, language } : { audioPath },
      TextOutput,
    );
    ctx.log.info("Transcribed recording", { audioPath, backend: resolved.backend, chars: value.length });
    return {
      "meeting.transcript": value,
      "meeting.transcriptBackend": resolved.backend,
    };
  },
};

const SUMMARY_SYSTEM =
  "You summarize meeting transcripts. Reply with a short summary, then a line " +
  "'Action items:' followed by one '- ' bullet per action item, or '- none'.";

export const summarize: Component = {
  name: "summarize",
  description: "Summarize a transcript and extract action items",
  reads: ["meeting.transcript"],
  writes: ["meeting.summary", "meeting.actionItems", "meeting.hasActionItems"],
  requires: ["generate-text"],

  async run(state, ctx) {
    const transcript = readState(state, "meeting.transcript", z.string(), this.name);
    const { value } = await generateText(ctx, this.name, `Transcript:\n${transcript}`, SUMMARY_SYSTEM);
    const { summary, actionItems } = parseSummary(value);
    return {
      "meeting.summary": summary,
      "meeting.actionItems": actionItems,
      "meeting.hasActionItems": actionItems.length > 0,
    };
  },
};

export const draftFollowup: Component = {
  name: "draft-followup",
  description: "Draft a follow-up email from a meeting summary",
  reads: ["meeting.summary", "meeting.actionItems"],
  writes: ["mail.draft"],
  requires: ["generate-text"],

  async run(state, ctx) {
    const summary = readState(state, "meeting.summary", z.string(), this.name);
    const items = readState(state, "meeting.actionItems", z.array(z.string()), this.name);
    const prompt = [
      "Write a short follow-up email to the meeting participants.",
      `Summary: ${summary}`,
      "Action items:",
      ...items.map((item) => `- ${item}`),
    ].join("\n");
    const { value } = await generateText(ctx, this.name, prompt);
    return { "mail.draft": value };
  },
};

const ACTION_HEADING = /^\s*(?:#+\s*)?\**action items\**\s*:?\s*\**\s*$/i;
const BULLET = /^\s*(?:[-*•]|\d+[.)])\s+(.+?)\s*$/;
const NONE = /^(?:none|n\/a|no action items)\.?$/i;

/**
 * Split a model reply into summary text and the bullet lines of its
 * "Action items" section. Without that section the whole reply is the summary.
 */
export function parseSummary(text: string): { summary: string; actionItems: string[] } {
  const lines = text.split(/\r?\n/);
  const heading = lines.findIndex((line) => ACTION_HEADING.test(line));
  if (heading === -1) return { summary: text.trim(), actionItems: [] };

  const actionItems: string[] = [];
  for (const line of lines.slice(heading + 1)) {
    if (line.trim() === "") continue;
    const match = BULLET.exec(line);
    if (!match) break;
    if (!NONE.test(match[1])) actionItems.push(match[1]);
  }
  return { summary: lines.slice(0, heading).join("\n").trim(), actionItems };
}
