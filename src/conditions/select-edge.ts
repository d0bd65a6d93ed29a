import { type State } from "../types";
import { type GuardLike } from "./guard";

export interface GuardedEdge {
    source: string;
    target: string;
    /** Absent for an unconditional edge. */
    guard?: GuardLike;
}

/**
 * Called for each edge whose guard threw during selection.
 */
export type GuardSkipHandler<E extends GuardedEdge> = (edge: E, error: unknown) => void;

/**
 * Picks the edge to follow out of a node.
 *
 * Edges are tried strictly in declaration order. The first edge without a guard,
 * or whose guard holds for `state`, wins. A guard that throws counts as not
 * holding and selection moves on to the next edge.
 *
 * @returns The chosen edge, or `undefined` when no edge applies
 *
 * @example
 * ```typescript
 * const next = selectEdge(outgoing, { attempts: 2 }, (edge, error) => {
 *   logger.debug({ target: edge.target, error }, "guard skipped");
 * });
 * ```
 */
export function selectEdge<E extends GuardedEdge>(
    edges: readonly E[],
    state: Readonly<State>,
    onSkip?: GuardSkipHandler<E>,
): E | undefined {
    for (const edge of edges) {
        if (edge.guard === undefined) {
            return edge;
        }
        try {
            if (edge.guard.test(state)) {
                return edge;
            }
        } catch (error) {
            onSkip?.(edge, error);
        }
    }
    return undefined;
}
