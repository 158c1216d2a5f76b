import { z } from "zod";
import type { Component } from "../graph/types.js";
import { generateText, invokeParsed, readState } from "./support.js";

const Passage = z.object({
  text: z.string(),
  score: z.number().optional(),
  source: z.string().optional(),
});
export type Passage = z.infer<typeof Passage>;

const SearchOutput = z.object({ results: z.array(Passage) });

const DEFAULT_TOP_K = 5;

export const retrieve: Component = {
  name: "retrieve",
  description: "Find passages relevant to a question",
  reads: ["knowledge.query"],
  writes: ["knowledge.passages"],
  requires: ["vector-search"],

  async run(state, ctx) {
    const query = readState(state, "knowledge.query", z.string().min(1), this.name);
    const topK = readState(state, "knowledge.topK", z.number().int().positive().default(DEFAULT_TOP_K), this.name);
    const { value } = await invokeParsed(ctx, this.name, "vector-search", { query, topK }, SearchOutput);
    ctx.log.debug("Retrieved passages", { count: value.results.length });
    return { "knowledge.passages": value.results.slice(0, topK) };
  },
};

export const answer: Component = {
  name: "answer",
  description: "Answer a question from retrieved passages",
  reads: ["knowledge.query", "knowledge.passages"],
  writes: ["knowledge.answer"],
  requires: ["generate-text"],

  async run(state, ctx) {
    const query = readState(state, "knowledge.query", z.string(), this.name);
    const passages = readState(state, "knowledge.passages", z.array(Passage), this.name);
    const { value } = await generateText(ctx, this.name, buildAnswerPrompt(query, passages));
    return { "knowledge.answer": value };
  },
};

export function buildAnswerPrompt(query: string, passages: readonly Passage[]): string {
  if (passages.length === 0) {
    return `Answer the question. No reference passages were found; say so if unsure.\n\nQuestion: ${query}`;
  }
  const context = passages
    .map((p, i) => `[${i + 1}]${p.source ? ` (${p.source})` : ""} ${p.text}`)
    .join("\n");
  return `Answer the question using only the passages below. Cite passages by number.\n\n${context}\n\nQuestion: ${query}`;
}
