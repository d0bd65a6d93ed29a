import { type z } from "zod";
import { type State } from "../types";

/**
 * What a tool hands back: a partial state update, right-merged into the run state.
 */
export type ToolOutput = State;

export type ToolFunction = (state: Readonly<State>) => ToolOutput | Promise<ToolOutput>;

/**
 * A named capability the engine invokes for a node.
 * `run` may finish immediately or return a promise; the registry awaits either.
 */
export interface ToolLike {
    readonly description?: string;
    /** When present, the registry checks every result against it. */
    readonly outputSchema?: z.ZodType<ToolOutput>;
    run(state: Readonly<State>): ToolOutput | Promise<ToolOutput>;
}
