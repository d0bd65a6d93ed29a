import { NotFoundError } from "../../errors";
import { cloneState, deepFreeze } from "../../util/clone-state";
import { type GraphDefinition } from "../definition";
import { type RunState } from "../types";
import { GraphStore } from "./graph-store";
import { RunStore } from "./run-store";

/**
 * Process-lifetime graph store.
 * Graphs are copied and frozen on the way in, so the stored definition can be
 * shared with every reader.
 *
 * @example
 * ```typescript
 * const graphs = new MemoryGraphStore();
 * const id = await graphs.create({
 *   nodes: [{ id: "a", toolName: "noop" }],
 *   startNodeId: "a",
 * });
 * ```
 */
export class MemoryGraphStore extends GraphStore {
    private readonly graphs = new Map<string, GraphDefinition>();

    async get(id: string): Promise<GraphDefinition> {
        const graph = this.graphs.get(id);
        if (graph === undefined) {
            throw new NotFoundError("graph", id);
        }
        return graph;
    }

    protected async write(graph: GraphDefinition): Promise<void> {
        this.graphs.set(graph.id, deepFreeze(cloneState(graph)));
    }

    async exists(id: string): Promise<boolean> {
        return this.graphs.has(id);
    }

    async dispose(): Promise<void> {
        this.graphs.clear();
    }
}

/**
 * Process-lifetime run store.
 * Each `put` swaps in a frozen copy of the whole record.
 */
export class MemoryRunStore extends RunStore {
    private readonly runs = new Map<string, RunState>();

    async put(run: RunState): Promise<void> {
        this.runs.set(run.runId, deepFreeze(cloneState(run)));
    }

    async get(runId: string): Promise<RunState> {
        const run = this.runs.get(runId);
        if (run === undefined) {
            throw new NotFoundError("run", runId);
        }
        return run;
    }

    async exists(runId: string): Promise<boolean> {
        return this.runs.has(runId);
    }

    async dispose(): Promise<void> {
        this.runs.clear();
    }
}
