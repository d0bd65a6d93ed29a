import { InvalidResultError, NotFoundError, ToolError, describeError } from "../errors";
import { type State } from "../types";
import { cloneState } from "../util/clone-state";
import { formatIssues } from "../util/format-issues";
import { isRecord } from "../util/is-record";
import { makeTool } from "./function-tool";
import { type ToolFunction, type ToolLike, type ToolOutput } from "./types";

function isToolLike(tool: ToolLike | ToolFunction): tool is ToolLike {
    return typeof tool === "object" && tool !== null && typeof tool.run === "function";
}

/**
 * Name-to-tool mapping the engine dispatches through.
 *
 * Tools receive a private copy of the run state, so whatever they do to their
 * argument never reaches the run. Their only effect is the record they return.
 *
 * @example
 * ```typescript
 * const tools = new ToolRegistry()
 *   .register("extract", (state) => ({ functions: parse(String(state.code)) }))
 *   .register("score", new AsyncFunctionTool(async (state) => ({ score: await rate(state) })));
 *
 * const update = await tools.run("extract", { code: "def a(): pass" });
 * ```
 */
export class ToolRegistry {
    private readonly tools = new Map<string, ToolLike>();

    /**
     * Stores a tool under `name`, replacing any tool already registered there.
     * Plain functions are wrapped with {@link makeTool}.
     */
    register(name: string, tool: ToolLike | ToolFunction): this {
        this.tools.set(name, isToolLike(tool) ? tool : makeTool(tool));
        return this;
    }

    /**
     * @throws {NotFoundError} If no tool is registered under `name`
     */
    get(name: string): ToolLike {
        const tool = this.tools.get(name);
        if (tool === undefined) {
            throw new NotFoundError("tool", name);
        }
        return tool;
    }

    has(name: string): boolean {
        return this.tools.has(name);
    }

    names(): string[] {
        return [...this.tools.keys()];
    }

    /**
     * Invokes a tool and validates what it returned.
     *
     * @returns A copy of the tool's update, as parsed by its output schema when it has one
     * @throws {NotFoundError} If the tool is not registered
     * @throws {ToolError} If the tool throws or its promise rejects
     * @throws {InvalidResultError} If the result is not a cloneable record, or fails the tool's output schema
     */
    async run(name: string, state: Readonly<State>): Promise<ToolOutput> {
        const tool = this.get(name);

        let result: unknown;
        try {
            result = await tool.run(cloneState(state));
        } catch (error) {
            throw new ToolError(name, error);
        }

        if (!isRecord(result)) {
            throw new InvalidResultError(name, `got ${result === null ? "null" : Array.isArray(result) ? "array" : typeof result}`);
        }
        let output: ToolOutput = result;
        if (tool.outputSchema !== undefined) {
            const parsed = tool.outputSchema.safeParse(result);
            if (!parsed.success) {
                throw new InvalidResultError(name, formatIssues(parsed.error).join("; "));
            }
            output = parsed.data;
        }

        try {
            return cloneState(output);
        } catch (error) {
            throw new InvalidResultError(name, describeError(error));
        }
    }
}
