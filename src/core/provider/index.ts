/**
 * Provider module - Language model execution providers
 */

export * from "./agent-provider";
export * from "./llm-agent-provider";
