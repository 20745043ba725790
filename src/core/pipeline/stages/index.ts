export * from "./agent-call";
export * from "./market-analyst-stage";
export * from "./trader-stage";
