export type WorkflowErrorCode =
    | "NOT_FOUND"
    | "INVALID_RESULT"
    | "TOOL_FAILED"
    | "GRAPH_INVALID"
    | "VALIDATION_FAILED"
    | "GUARD_SYNTAX"
    | "GUARD_EVALUATION";

/**
 * Base class for every error raised by the runner.
 * The `code` lets callers branch on the failure kind without `instanceof` chains,
 * e.g. when mapping errors onto transport responses.
 *
 * @example
 * ```typescript
 * try {
 *   await engine.runOnce("missing", {});
 * } catch (error) {
 *   if (error instanceof WorkflowError && error.code === "NOT_FOUND") {
 *     // respond with 404
 *   }
 * }
 * ```
 */
export class WorkflowError extends Error {
    constructor(
        public readonly code: WorkflowErrorCode,
        message: string,
        options?: { cause?: unknown },
    ) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * A graph, run, tool or node lookup missed.
 */
export class NotFoundError extends WorkflowError {
    constructor(
        public readonly kind: "graph" | "run" | "tool" | "node",
        public readonly id: string,
    ) {
        super("NOT_FOUND", `${kind.charAt(0).toUpperCase()}${kind.slice(1)} '${id}' not found`);
    }
}

export class InvalidResultError extends WorkflowError {
    constructor(public readonly toolName: string, reason: string) {
        super("INVALID_RESULT", `Tool '${toolName}' must return a record to merge into state: ${reason}`);
    }
}

/**
 * Wraps whatever a tool threw or rejected with.
 */
export class ToolError extends WorkflowError {
    constructor(public readonly toolName: string, cause: unknown) {
        super("TOOL_FAILED", `Tool '${toolName}' threw: ${describeError(cause)}`, { cause });
    }
}

export class ValidationError extends WorkflowError {
    constructor(message: string, public readonly issues: string[] = []) {
        super("VALIDATION_FAILED", issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    }
}

export class GraphValidationError extends WorkflowError {
    constructor(public readonly issues: string[]) {
        super("GRAPH_INVALID", `Invalid graph definition: ${issues.join("; ")}`);
    }
}

export class GuardSyntaxError extends WorkflowError {
    constructor(message: string, public readonly position: number) {
        super("GUARD_SYNTAX", `${message} at position ${position}`);
    }
}

export class GuardEvaluationError extends WorkflowError {
    constructor(message: string) {
        super("GUARD_EVALUATION", message);
    }
}

/**
 * Renders any thrown value as a single-line message.
 */
export function describeError(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}
