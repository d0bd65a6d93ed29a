import { type State } from "../types";

/**
 * Right-biased shallow merge of a tool result into the run state.
 * Keys present in `changes` replace the existing values wholesale (nested
 * objects and arrays are not merged element-wise); every other key is kept.
 * Neither argument is mutated.
 *
 * @example
 * ```typescript
 * mergeState({ x: 0, y: 2 }, { x: 1 });
 * // { x: 1, y: 2 }
 *
 * mergeState({ user: { name: "Ada", age: 36 } }, { user: { age: 37 } });
 * // { user: { age: 37 } }
 * ```
 */
export function mergeState(base: Readonly<State>, changes: Readonly<State>): State {
    return { ...base, ...changes };
}
