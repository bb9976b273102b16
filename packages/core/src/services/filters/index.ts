export * from "./quality-gate";
export * from "./citation-gate";
export * from "./relevance-gate";
