import { type State } from "../types";
import { cloneState, deepFreeze } from "../util/clone-state";
import { mergeState } from "../util/merge-state";
import { TERMINAL_STATUSES, type RunLogEntry, type RunState, type RunStatus } from "./types";

/**
 * The engine's private, mutable view of a run in progress.
 *
 * Exactly one engine execution owns an instance; everything outside sees
 * the run only through frozen {@link RunState} snapshots. Once the run reaches
 * a terminal status every mutator throws.
 *
 * @example
 * ```typescript
 * const run = new RunContext("run-1", "graph-1", "start", { count: 0 });
 * run.merge({ count: 1 });
 * run.log("start", "Executed tool 'increment'");
 * run.complete();
 * run.snapshot(); // { status: "completed", currentNodeId: null, ... }
 * ```
 */
export class RunContext {
    private _status: RunStatus = "running";
    private _currentNodeId: string | null;
    private _state: State;
    private readonly logs: RunLogEntry[] = [];

    /**
     * @param initialState - Must already be a private copy; the run takes ownership
     */
    constructor(
        public readonly runId: string,
        public readonly graphId: string,
        startNodeId: string,
        initialState: State,
    ) {
        this._currentNodeId = startNodeId;
        this._state = initialState;
    }

    get status(): RunStatus {
        return this._status;
    }

    get currentNodeId(): string | null {
        return this._currentNodeId;
    }

    get state(): Readonly<State> {
        return this._state;
    }

    get isTerminal(): boolean {
        return TERMINAL_STATUSES.includes(this._status);
    }

    /** Right-biased merge of a tool's update into the state. */
    merge(update: Readonly<State>): void {
        this.assertRunning();
        this._state = mergeState(this._state, update);
    }

    /** Appends a log entry carrying an independent copy of the current state. */
    log(nodeId: string, message: string): void {
        this.assertRunning();
        this.logs.push(deepFreeze({ nodeId, message, stateSnapshot: cloneState(this._state) }));
    }

    moveTo(nodeId: string): void {
        this.assertRunning();
        this._currentNodeId = nodeId;
    }

    complete(): void {
        this.assertRunning();
        this._status = "completed";
        this._currentNodeId = null;
    }

    /**
     * Records why the run stopped and marks it failed. The current node id is
     * kept so the record shows where execution stopped.
     */
    fail(nodeId: string, message: string): void {
        this.log(nodeId, message);
        this._status = "failed";
    }

    cancel(nodeId: string, message: string): void {
        this.log(nodeId, message);
        this._status = "cancelled";
    }

    /** Deep-frozen copy of the run as it stands. */
    snapshot(): RunState {
        return deepFreeze(cloneState({
            runId: this.runId,
            graphId: this.graphId,
            status: this._status,
            currentNodeId: this._currentNodeId,
            state: this._state,
            logs: this.logs,
        }));
    }

    private assertRunning(): void {
        if (this.isTerminal) {
            throw new Error(`Run ${this.runId} is already ${this._status}`);
        }
    }
}
