import { type RunState } from "../types";

/**
 * Keyed storage for run records.
 *
 * `put` is an idempotent upsert by run id; the engine calls it when a run is
 * created and after every step, so readers polling `get` observe a growing
 * prefix of the run's log. Implementations must store and return whole records,
 * never a partially written one.
 *
 * @abstract
 */
export abstract class RunStore {
    abstract put(run: RunState): Promise<void>;

    /**
     * @throws {NotFoundError} If no run is stored under `runId`
     */
    abstract get(runId: string): Promise<RunState>;

    abstract exists(runId: string): Promise<boolean>;

    abstract dispose(): Promise<void>;
}
