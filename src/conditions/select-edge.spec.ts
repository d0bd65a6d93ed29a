import { describe, expect, it, vi } from "vitest";
import { selectEdge, type GuardedEdge } from "./select-edge";
import { Guard, UnparsableGuard } from "./guard";
import { GuardSyntaxError } from "../errors";

const edge = (target: string, condition?: string): GuardedEdge =>
    condition === undefined
        ? { source: "from", target }
        : { source: "from", target, guard: Guard.parse(condition) };

describe("selectEdge", () => {
    it("should return undefined when there are no edges", () => {
        expect(selectEdge([], {})).toBeUndefined();
    });

    it("should return the first edge whose guard holds", () => {
        const edges = [edge("low", "score < 5"), edge("mid", "score < 10"), edge("high")];
        expect(selectEdge(edges, { score: 7 })?.target).toBe("mid");
        expect(selectEdge(edges, { score: 2 })?.target).toBe("low");
    });

    it("should fall through to an unconditional default", () => {
        const edges = [edge("retry", "attempts < 3"), edge("done")];
        expect(selectEdge(edges, { attempts: 3 })?.target).toBe("done");
    });

    it("should respect declaration order even when the default comes first", () => {
        const edges = [edge("default"), edge("never-reached", "true")];
        expect(selectEdge(edges, {})?.target).toBe("default");
    });

    it("should return undefined when no guard holds and there is no default", () => {
        expect(selectEdge([edge("retry", "attempts < 3")], { attempts: 5 })).toBeUndefined();
    });

    it("should skip guards that throw and report them", () => {
        const broken = edge("broken", "missing > 1");
        const unparsable: GuardedEdge = {
            source: "from",
            target: "unparsable",
            guard: new UnparsableGuard("a = 1", new GuardSyntaxError("Unexpected character '='", 2)),
        };
        const fallback = edge("fallback", "ready");
        const onSkip = vi.fn();

        const result = selectEdge([broken, unparsable, fallback], { ready: true }, onSkip);

        expect(result).toBe(fallback);
        expect(onSkip).toHaveBeenCalledTimes(2);
        expect(onSkip.mock.calls.map(([skipped]) => skipped)).toEqual([broken, unparsable]);
    });
});
