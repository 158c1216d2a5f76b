import { z } from "zod";
import { ComponentError } from "../errors.js";
import type { Component } from "../graph/types.js";
import { generateText, invokeParsed, readState } from "./support.js";

const MailMessage = z.object({
  id: z.string(),
  from: z.string(),
  subject: z.string(),
  body: z.string().optional(),
  needsReply: z.boolean().optional(),
});
export type MailMessage = z.infer<typeof MailMessage>;

const SyncOutput = z.object({ messages: z.array(MailMessage) });

/** Backends may flag messages themselves; otherwise a question in the message asks for a reply. */
export function needsReply(message: MailMessage): boolean {
  return message.needsReply ?? (message.body ?? message.subject).includes("?");
}

export const syncMail: Component = {
  name: "sync-mail",
  description: "Fetch new messages from the mailbox",
  writes: ["mail.messages", "mail.needsReply"],
  requires: ["mail-sync"],

  async run(state, ctx) {
    const since = readState(state, "mail.since", z.string().optional(), this.name);
    const { value } = await invokeParsed(ctx, this.name, "mail-sync", since ? { since } : {}, SyncOutput);
    ctx.log.info("Synced mailbox", { messages: value.messages.length });
    return {
      "mail.messages": value.messages,
      "mail.needsReply": value.messages.some(needsReply),
    };
  },
};

export const draftReply: Component = {
  name: "draft-reply",
  description: "Draft a reply to the first message that needs one",
  reads: ["mail.messages"],
  writes: ["mail.draft", "mail.replyTo"],
  requires: ["generate-text"],

  async run(state, ctx) {
    const messages = readState(state, "mail.messages", z.array(MailMessage), this.name);
    const target = messages.find(needsReply);
    if (!target) throw new ComponentError(this.name, "no message needs a reply", ctx.nodeId);

    const prompt = [
      "Draft a concise, polite reply to this email.",
      `From: ${target.from}`,
      `Subject: ${target.subject}`,
      "",
      target.body ?? "",
    ].join("\n");
    const { value } = await generateText(ctx, this.name, prompt);
    return { "mail.draft": value, "mail.replyTo": target.id };
  },
};
