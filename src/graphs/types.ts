import { type State } from "../types";

export const RUN_STATUSES = ["pending", "running", "completed", "failed", "cancelled"] as const;

export type RunStatus = typeof RUN_STATUSES[number];

export const TERMINAL_STATUSES: readonly RunStatus[] = ["completed", "failed", "cancelled"];

export interface RunLogEntry {
    readonly nodeId: string;
    readonly message: string;
    /** Copy of the state as it was when the entry was written. */
    readonly stateSnapshot: Readonly<State>;
}

/**
 * A run record as seen outside the engine: stored in the run store,
 * returned from `runOnce`. Records handed out are deep-frozen.
 */
export interface RunState {
    readonly runId: string;
    readonly graphId: string;
    readonly status: RunStatus;
    /** `null` once the run has completed. */
    readonly currentNodeId: string | null;
    readonly state: Readonly<State>;
    readonly logs: readonly RunLogEntry[];
}
