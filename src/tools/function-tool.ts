import { type z } from "zod";
import { type State } from "../types";
import { type ToolFunction, type ToolLike, type ToolOutput } from "./types";

export interface ToolOptions {
    description?: string;
    outputSchema?: z.ZodType<ToolOutput>;
}

/**
 * A tool that runs synchronously and returns its update immediately.
 *
 * @example
 * ```typescript
 * const increment = new FunctionTool((state) => ({
 *   count: Number(state.count ?? 0) + 1,
 * }));
 * ```
 */
export class FunctionTool implements ToolLike {
    readonly description?: string;
    readonly outputSchema?: z.ZodType<ToolOutput>;

    constructor(
        private readonly func: (state: Readonly<State>) => ToolOutput,
        options: ToolOptions = {},
    ) {
        this.description = options.description;
        this.outputSchema = options.outputSchema;
    }

    run(state: Readonly<State>): ToolOutput {
        return this.func(state);
    }
}

/**
 * A tool that suspends on external work (I/O, timers) before returning its update.
 * Other runs keep progressing while it waits.
 *
 * @example
 * ```typescript
 * const fetchScore = new AsyncFunctionTool(async (state) => {
 *   const score = await scoringClient.score(String(state.code));
 *   return { quality_score: score };
 * });
 * ```
 */
export class AsyncFunctionTool implements ToolLike {
    readonly description?: string;
    readonly outputSchema?: z.ZodType<ToolOutput>;

    constructor(
        private readonly func: (state: Readonly<State>) => Promise<ToolOutput>,
        options: ToolOptions = {},
    ) {
        this.description = options.description;
        this.outputSchema = options.outputSchema;
    }

    async run(state: Readonly<State>): Promise<ToolOutput> {
        return await this.func(state);
    }
}

/**
 * Wraps a plain function as a tool. Functions that may return either a value
 * or a promise are treated as suspending.
 */
export function makeTool(func: ToolFunction, options?: ToolOptions): ToolLike {
    return new AsyncFunctionTool(async (state) => await func(state), options);
}
