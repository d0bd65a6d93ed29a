export { ExecutionEngine, type RunOptions } from "./engine";
export { createEngineContext, disposeEngineContext, type EngineContext } from "./engine-context";
export { GraphBuilder } from "./graph-builder";
export { CompiledGraph, type CompiledEdge } from "./compiled-graph";
export { RunContext } from "./run-context";
export {
    validateGraph,
    findGraphIssues,
    GraphInputSchema,
    type GraphDefinition,
    type GraphInput,
    type NodeDefinition,
    type EdgeDefinition,
} from "./definition";
export { RUN_STATUSES, TERMINAL_STATUSES, type RunState, type RunStatus, type RunLogEntry } from "./types";
export { GraphStore } from "./store/graph-store";
export { RunStore } from "./store/run-store";
export { MemoryGraphStore, MemoryRunStore } from "./store/memory-store";
