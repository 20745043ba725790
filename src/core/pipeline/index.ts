/**
 * Pipeline module - stages, contracts and run context
 */

export * from "./pipeline-stage";
export * from "./stage-result";
export * from "./pipeline-context";
export * from "./output-contract";
export * from "./stages";
