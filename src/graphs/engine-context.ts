import { type EngineConfig } from "../config";
import { makeLogger, type Logger } from "../logger";
import { ToolRegistry } from "../tools/registry";
import { type GraphStore } from "./store/graph-store";
import { MemoryGraphStore, MemoryRunStore } from "./store/memory-store";
import { type RunStore } from "./store/run-store";

/**
 * Everything an engine needs from its surroundings, passed in explicitly
 * instead of living in module-level singletons.
 */
export interface EngineContext {
    graphs: GraphStore;
    runs: RunStore;
    tools: ToolRegistry;
    logger: Logger;
}

/**
 * Builds a context, filling anything not supplied with fresh memory stores,
 * an empty registry and a pino logger at `config.logLevel`.
 *
 * @example
 * ```typescript
 * const context = createEngineContext({ logger: makeNoopLogger() });
 * context.tools.register("increment", (state) => ({ count: Number(state.count) + 1 }));
 * ```
 */
export function createEngineContext(
    overrides: Partial<EngineContext> = {},
    config: Partial<Pick<EngineConfig, "logLevel">> = {},
): EngineContext {
    return {
        graphs: overrides.graphs ?? new MemoryGraphStore(),
        runs: overrides.runs ?? new MemoryRunStore(),
        tools: overrides.tools ?? new ToolRegistry(),
        logger: overrides.logger ?? makeLogger({ component: "engine" }, config.logLevel),
    };
}

/** Disposes both stores. */
export async function disposeEngineContext(context: EngineContext): Promise<void> {
    await Promise.all([context.graphs.dispose(), context.runs.dispose()]);
}
