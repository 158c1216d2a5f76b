import { type GraphDefinition, TERMINAL } from "../graph/types.js";

export const mailReplyPipeline: GraphDefinition = {
  name: "mail-reply",
  description: "Sync the mailbox and draft a reply when a message asks for one",
  nodes: [
    {
      id: "sync-mail",
      entry: true,
      edges: [
        { to: "draft-reply", when: { key: "mail.needsReply", truthy: true } },
        { to: TERMINAL },
      ],
    },
    { id: "draft-reply", edges: [{ to: TERMINAL }] },
  ],
};
