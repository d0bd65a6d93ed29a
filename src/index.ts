export * from "./graphs";
export * from "./tools";
export * from "./conditions";
export * from "./errors";
export { WorkflowService, RunGraphRequestSchema, type RunGraphRequest, type CreateGraphResponse, type RunGraphResponse, type RunStateResponse } from "./workflows/workflow-service";
export { loadEngineConfig, EngineConfigSchema, DEFAULT_MAX_STEPS, type EngineConfig } from "./config";
export { makeLogger, makeNoopLogger, type Logger } from "./logger";
export { mergeState } from "./util/merge-state";
export { type State } from "./types";
