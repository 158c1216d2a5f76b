import { type GraphDefinition, TERMINAL } from "../graph/types.js";

/** Transcribe a recording, summarize it, and draft a follow-up only when there are action items. */
export const meetingPipeline: GraphDefinition = {
  name: "meeting",
  description: "Meeting recording to summary and follow-up email",
  inputs: ["meeting.audioPath"],
  nodes: [
    { id: "transcribe", entry: true, edges: [{ to: "summarize" }] },
    {
      id: "summarize",
      edges: [
        { to: "draft-followup", when: { key: "meeting.hasActionItems", truthy: true } },
        { to: TERMINAL },
      ],
    },
    { id: "draft-followup", edges: [{ to: TERMINAL }] },
  ],
};
