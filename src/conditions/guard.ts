import { type GuardSyntaxError } from "../errors";
import { type State } from "../types";
import { type Expression } from "./ast";
import { evaluate, isTruthy } from "./evaluator";
import { parseGuard } from "./parser";

/**
 * A condition attached to an edge.
 */
export interface GuardLike {
    readonly source: string;
    /**
     * @throws If the guard cannot be evaluated against this state
     */
    test(state: Readonly<State>): boolean;
}

/**
 * A guard that parsed successfully.
 *
 * @example
 * ```typescript
 * const guard = Guard.parse("state.get('quality_score', 0) < state.get('threshold', 80)");
 * guard.test({ quality_score: 60 }); // true
 * ```
 */
export class Guard implements GuardLike {
    private constructor(
        public readonly source: string,
        public readonly expression: Expression,
    ) { }

    /**
     * @throws {GuardSyntaxError} If `source` is outside the guard grammar
     */
    static parse(source: string): Guard {
        return new Guard(source, parseGuard(source));
    }

    test(state: Readonly<State>): boolean {
        return isTruthy(evaluate(this.expression, state));
    }
}

/**
 * Stands in for a guard that failed to parse, on graphs that reached the engine
 * without validation. Every test fails, so the edge is never taken.
 */
export class UnparsableGuard implements GuardLike {
    constructor(
        public readonly source: string,
        public readonly error: GuardSyntaxError,
    ) { }

    test(): boolean {
        throw this.error;
    }
}
