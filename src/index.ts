/**
 * Stock analyst pipeline - public API
 */

export * from "./core/errors/pipeline-errors";
export * from "./core/models/market";
export * from "./core/models/stage";
export * from "./core/market/market-config";
export * from "./core/capabilities/capability";
export * from "./core/capabilities/yahoo-market-data";
export * from "./core/capabilities/tavily-web-search";
export * from "./core/provider";
export * from "./core/role/role-definition";
export * from "./core/role/role-loader";
export * from "./core/pipeline";
export * from "./core/orchestrator/sequential-pipeline";
export * from "./core/orchestrator/stock-analyst";
export * from "./core/events/event-bus";
export * from "./core/store";
export * from "./core/config/app-config";
export * from "./core/stock-analyst-system";
