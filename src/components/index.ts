import type { Component } from "../graph/types.js";
import { answer, retrieve } from "./knowledge.js";
import { draftReply, syncMail } from "./mail.js";
import { draftFollowup, summarize, transcribe } from "./meeting.js";

export { answer, buildAnswerPrompt, retrieve } from "./knowledge.js";
export type { Passage } from "./knowledge.js";
export { draftReply, needsReply, syncMail } from "./mail.js";
export type { MailMessage } from "./mail.js";
export { draftFollowup, parseSummary, summarize, transcribe } from "./meeting.js";

export const builtinComponents: readonly Component[] = [
  transcribe,
  summarize,
  draftFollowup,
  retrieve,
  answer,
  syncMail,
  draftReply,
];
