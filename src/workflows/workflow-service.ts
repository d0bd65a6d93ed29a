import { z } from "zod";
import { ValidationError } from "../errors";
import { type EngineContext } from "../graphs/engine-context";
import { ExecutionEngine } from "../graphs/engine";
import { type RunLogEntry, type RunStatus } from "../graphs/types";
import { type State } from "../types";
import { formatIssues } from "../util/format-issues";

export const RunGraphRequestSchema = z.object({
    graphId: z.string().min(1),
    initialState: z.record(z.string(), z.unknown()).default({}),
    maxSteps: z.number().int().nonnegative().optional(),
});

export type RunGraphRequest = z.input<typeof RunGraphRequestSchema>;

export interface CreateGraphResponse {
    graphId: string;
}

export interface RunGraphResponse {
    runId: string;
    finalState: Readonly<State>;
    logs: readonly RunLogEntry[];
    status: RunStatus;
}

export interface RunStateResponse {
    runId: string;
    status: RunStatus;
    currentNodeId: string | null;
    state: Readonly<State>;
    logs: readonly RunLogEntry[];
}

/**
 * The create-graph / run-graph / get-run surface, independent of any transport.
 * Request bodies are validated here; a route handler only has to map
 * {@link WorkflowError} codes to its own status codes (`NOT_FOUND` → 404,
 * `GRAPH_INVALID` and `VALIDATION_FAILED` → 400).
 */
export class WorkflowService {
    private readonly engine: ExecutionEngine;

    constructor(private readonly context: EngineContext, engine?: ExecutionEngine) {
        this.engine = engine ?? new ExecutionEngine(context);
    }

    /**
     * @throws {GraphValidationError} If the body is not a valid graph
     */
    async createGraph(body: unknown): Promise<CreateGraphResponse> {
        const graphId = await this.context.graphs.create(body);
        this.context.logger.info({ graphId }, "graph created");
        return { graphId };
    }

    /**
     * Runs a graph to completion and returns its outcome, failed runs included.
     *
     * @throws {ValidationError} If the body is malformed
     * @throws {NotFoundError} If the graph does not exist
     */
    async runGraph(body: unknown, signal?: AbortSignal): Promise<RunGraphResponse> {
        const parsed = RunGraphRequestSchema.safeParse(body);
        if (!parsed.success) {
            throw new ValidationError("Invalid run request", formatIssues(parsed.error));
        }
        const { graphId, initialState, maxSteps } = parsed.data;

        const run = await this.engine.runOnce(graphId, initialState, { maxSteps, signal });
        return {
            runId: run.runId,
            finalState: run.state,
            logs: run.logs,
            status: run.status,
        };
    }

    /**
     * Current view of a run, finished or not.
     *
     * @throws {NotFoundError} If the run does not exist
     */
    async getRun(runId: string): Promise<RunStateResponse> {
        const run = await this.context.runs.get(runId);
        return {
            runId: run.runId,
            status: run.status,
            currentNodeId: run.currentNodeId,
            state: run.state,
            logs: run.logs,
        };
    }
}
