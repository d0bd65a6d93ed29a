import { createId } from "@paralleldrive/cuid2";
import { z } from "zod";
import { EngineConfigSchema, type EngineConfig } from "../config";
import { selectEdge } from "../conditions/select-edge";
import { ToolError, ValidationError, describeError } from "../errors";
import { type Logger } from "../logger";
import { type ToolRegistry } from "../tools/registry";
import { type State } from "../types";
import { cloneState } from "../util/clone-state";
import { formatIssues } from "../util/format-issues";
import { isRecord } from "../util/is-record";
import { CompiledGraph, type CompiledEdge } from "./compiled-graph";
import { type EngineContext } from "./engine-context";
import { RunContext } from "./run-context";
import { type RunState } from "./types";

export interface RunOptions {
    /** Upper bound on node executions; defaults to the engine's configured `maxSteps`. */
    maxSteps?: number;
    /** Checked before every step; an aborted signal ends the run as `cancelled`. */
    signal?: AbortSignal;
    /** Registry to dispatch through instead of the context's. */
    tools?: ToolRegistry;
}

const MaxStepsSchema = z.number().int().nonnegative();

/**
 * Runs graphs from their start node until no outgoing edge applies or the step
 * budget runs out.
 *
 * Each step executes the current node's tool, right-merges its update into the
 * run state, logs a snapshot, then follows the first edge whose guard holds.
 * Nodes may be revisited any number of times; only `maxSteps` bounds a loop.
 *
 * Problems inside a run (a missing node, a failing tool, an exhausted budget,
 * cancellation) end the run with a terminal status and a log entry; `runOnce`
 * still resolves with the run. Only problems found before the run exists (an
 * unknown graph, invalid arguments) are thrown.
 *
 * @example
 * ```typescript
 * const context = createEngineContext();
 * context.tools.register("increment", (state) => ({ count: Number(state.count) + 1 }));
 * const graphId = await context.graphs.create({
 *   nodes: [{ id: "loop", toolName: "increment" }],
 *   edges: [{ source: "loop", target: "loop", condition: "count < 3" }],
 *   startNodeId: "loop",
 * });
 *
 * const run = await new ExecutionEngine(context).runOnce(graphId, { count: 0 });
 * // run.status === "completed", run.state.count === 3, run.logs.length === 3
 * ```
 */
export class ExecutionEngine {
    private readonly config: EngineConfig;

    constructor(
        private readonly context: EngineContext,
        config: Partial<EngineConfig> = {},
    ) {
        const parsed = EngineConfigSchema.safeParse(config);
        if (!parsed.success) {
            throw new ValidationError("Invalid engine configuration", formatIssues(parsed.error));
        }
        this.config = parsed.data;
    }

    /**
     * Executes a stored graph once.
     *
     * @param graphId - Graph to run
     * @param initialState - Copied before use; the caller's object is never touched
     * @returns The finished run, deep-frozen
     * @throws {NotFoundError} If the graph does not exist; no run record is created
     * @throws {ValidationError} If `initialState` is not a record of cloneable values or `maxSteps` is not a non-negative integer
     */
    async runOnce(graphId: string, initialState: unknown = {}, options: RunOptions = {}): Promise<RunState> {
        const maxSteps = this.resolveMaxSteps(options.maxSteps);
        const state = this.copyInitialState(initialState);
        const graph = CompiledGraph.compile(await this.context.graphs.get(graphId));
        const tools = options.tools ?? this.context.tools;

        const run = new RunContext(createId(), graph.id, graph.startNodeId, state);
        const logger = this.context.logger.child({ runId: run.runId, graphId: graph.id });

        await this.save(run);
        logger.info({ maxSteps, startNodeId: graph.startNodeId }, "run started");

        await this.execute(run, graph, tools, maxSteps, options.signal, logger);

        const result = run.snapshot();
        const summary = { status: result.status, steps: result.logs.length, currentNodeId: result.currentNodeId };
        if (result.status === "completed") {
            logger.info(summary, "run finished");
        } else {
            logger.warn({ ...summary, reason: result.logs.at(-1)?.message }, "run finished");
        }
        return result;
    }

    private async execute(
        run: RunContext,
        graph: CompiledGraph,
        tools: ToolRegistry,
        maxSteps: number,
        signal: AbortSignal | undefined,
        logger: Logger,
    ): Promise<void> {
        for (let step = 0; step < maxSteps; step++) {
            const nodeId = run.currentNodeId;
            if (nodeId === null) {
                return;
            }

            if (signal?.aborted) {
                run.cancel(nodeId, "Run cancelled");
                await this.save(run);
                return;
            }

            const node = graph.node(nodeId);
            if (node === undefined) {
                run.fail(nodeId, `Node '${nodeId}' not found in graph`);
                await this.save(run);
                return;
            }

            let update: State;
            try {
                update = await tools.run(node.toolName, run.state);
            } catch (error) {
                const reason = error instanceof ToolError ? describeError(error.cause) : describeError(error);
                logger.warn({ step, nodeId, toolName: node.toolName, err: error }, "tool failed");
                run.fail(nodeId, `Tool '${node.toolName}' failed: ${reason}`);
                await this.save(run);
                return;
            }

            run.merge(update);
            run.log(nodeId, `Executed tool '${node.toolName}'`);
            logger.debug({ step, nodeId, toolName: node.toolName, keys: Object.keys(update) }, "step executed");

            const edge = selectEdge(graph.edgesFrom(nodeId), run.state, (skipped: CompiledEdge, error) => {
                logger.debug(
                    { step, source: skipped.source, target: skipped.target, condition: skipped.condition, err: error },
                    "guard evaluation skipped",
                );
            });

            if (edge === undefined) {
                run.complete();
            } else {
                run.moveTo(edge.target);
            }
            await this.save(run);
            if (run.isTerminal) {
                return;
            }
        }

        const nodeId = run.currentNodeId;
        if (nodeId !== null && !run.isTerminal) {
            run.fail(nodeId, "Max steps reached; aborting (possible infinite loop)");
            await this.save(run);
        }
    }

    private resolveMaxSteps(maxSteps: number | undefined): number {
        const parsed = MaxStepsSchema.safeParse(maxSteps ?? this.config.maxSteps);
        if (!parsed.success) {
            throw new ValidationError("maxSteps must be a non-negative integer", formatIssues(parsed.error));
        }
        return parsed.data;
    }

    private copyInitialState(initialState: unknown): State {
        if (!isRecord(initialState)) {
            throw new ValidationError("Initial state must be a record of string keys to values");
        }
        try {
            return cloneState(initialState);
        } catch (error) {
            throw new ValidationError("Initial state must contain only cloneable values", [describeError(error)]);
        }
    }

    private async save(run: RunContext): Promise<void> {
        await this.context.runs.put(run.snapshot());
    }
}
