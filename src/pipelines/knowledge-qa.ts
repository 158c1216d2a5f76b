import { type GraphDefinition, TERMINAL } from "../graph/types.js";

export const knowledgeQaPipeline: GraphDefinition = {
  name: "knowledge-qa",
  description: "Answer a question from the document index",
  inputs: ["knowledge.query"],
  nodes: [
    { id: "retrieve", entry: true, edges: [{ to: "answer" }] },
    { id: "answer", edges: [{ to: TERMINAL }] },
  ],
};
