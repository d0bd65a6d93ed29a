import { beforeEach, describe, expect, it, vi } from "vitest";
import { ExecutionEngine } from "./engine";
import { createEngineContext, type EngineContext } from "./engine-context";
import { GraphBuilder } from "./graph-builder";
import { AsyncFunctionTool } from "../tools/function-tool";
import { makeNoopLogger } from "../logger";
import { NotFoundError, ValidationError } from "../errors";
import { type GraphDefinition } from "./definition";
import { MemoryGraphStore } from "./store/memory-store";

const increment = (state: Readonly<Record<string, unknown>>) => ({ count: Number(state.count ?? 0) + 1 });

/** Stores graphs without checking them, as a third-party store might. */
class UncheckedGraphStore extends MemoryGraphStore {
    override async put(graph: GraphDefinition): Promise<string> {
        await this.write(graph);
        return graph.id;
    }
}

describe("ExecutionEngine", () => {
    let context: EngineContext;
    let engine: ExecutionEngine;

    beforeEach(() => {
        context = createEngineContext({ logger: makeNoopLogger() });
        context.tools
            .register("a", () => ({ a: 1 }))
            .register("b", (state) => ({ b: Number(state.a) + 1 }))
            .register("c", (state) => ({ c: Number(state.b) + 1 }))
            .register("increment", increment);
        engine = new ExecutionEngine(context);
    });

    async function linearGraph(): Promise<string> {
        return await context.graphs.put(
            new GraphBuilder()
                .addNode("A", "a")
                .addNode("B", "b")
                .addNode("C", "c")
                .addEdge("A", "B")
                .addEdge("B", "C")
                .build("linear"),
        );
    }

    async function selfLoop(condition: string): Promise<string> {
        return await context.graphs.put(
            new GraphBuilder()
                .addNode("loop", "increment")
                .addEdge("loop", "loop", condition)
                .build("self-loop"),
        );
    }

    it("should run a linear graph to completion", async () => {
        const run = await engine.runOnce(await linearGraph(), {});

        expect(run.status).toBe("completed");
        expect(run.currentNodeId).toBeNull();
        expect(run.graphId).toBe("linear");
        expect(run.state).toEqual({ a: 1, b: 2, c: 3 });
        expect(run.logs).toEqual([
            { nodeId: "A", message: "Executed tool 'a'", stateSnapshot: { a: 1 } },
            { nodeId: "B", message: "Executed tool 'b'", stateSnapshot: { a: 1, b: 2 } },
            { nodeId: "C", message: "Executed tool 'c'", stateSnapshot: { a: 1, b: 2, c: 3 } },
        ]);
    });

    it("should merge tool results right-biased", async () => {
        context.tools.register("set-x", () => ({ x: 1 }));
        const graphId = await context.graphs.put(new GraphBuilder().addNode("only", "set-x").build());

        const run = await engine.runOnce(graphId, { x: 0, y: 2 });
        expect(run.state).toEqual({ x: 1, y: 2 });
    });

    it("should leave the loop once its guard turns false", async () => {
        const run = await engine.runOnce(await selfLoop("count < 3"), { count: 0 });

        expect(run.status).toBe("completed");
        expect(run.state).toEqual({ count: 3 });
        expect(run.logs.map((entry) => entry.nodeId)).toEqual(["loop", "loop", "loop"]);
    });

    it("should fail after exactly maxSteps executions when the loop never exits", async () => {
        const run = await engine.runOnce(await selfLoop("count > 0"), { count: 0 }, { maxSteps: 5 });

        expect(run.status).toBe("failed");
        expect(run.currentNodeId).toBe("loop");
        expect(run.logs).toHaveLength(6);
        expect(run.logs.slice(0, 5).map((entry) => entry.message)).toEqual(
            Array(5).fill("Executed tool 'increment'"),
        );
        expect(run.logs[5]).toEqual({
            nodeId: "loop",
            message: "Max steps reached; aborting (possible infinite loop)",
            stateSnapshot: { count: 5 },
        });
    });

    it("should complete when the last allowed step finds no edge", async () => {
        const run = await engine.runOnce(await selfLoop("count < 3"), { count: 0 }, { maxSteps: 3 });

        expect(run.status).toBe("completed");
        expect(run.logs).toHaveLength(3);
    });

    it("should abort before any step when maxSteps is 0", async () => {
        const run = await engine.runOnce(await linearGraph(), { seed: true }, { maxSteps: 0 });

        expect(run.status).toBe("failed");
        expect(run.currentNodeId).toBe("A");
        expect(run.logs).toEqual([
            {
                nodeId: "A",
                message: "Max steps reached; aborting (possible infinite loop)",
                stateSnapshot: { seed: true },
            },
        ]);
    });

    it("should use the configured default step bound", async () => {
        const bounded = new ExecutionEngine(context, { maxSteps: 2 });
        const run = await bounded.runOnce(await selfLoop("true"), { count: 0 });

        expect(run.status).toBe("failed");
        expect(run.state).toEqual({ count: 2 });
    });

    it("should skip an erroring guard and take the next edge", async () => {
        const graphId = await context.graphs.put(
            new GraphBuilder()
                .addNode("A", "a")
                .addNode("B", "b")
                .addNode("C", "c")
                .addEdge("A", "B", "missing > 1")
                .addEdge("A", "C")
                .build(),
        );

        const run = await engine.runOnce(graphId, { b: 10 });
        expect(run.status).toBe("completed");
        expect(run.logs.map((entry) => entry.nodeId)).toEqual(["A", "C"]);
        expect(run.state).toEqual({ a: 1, b: 10, c: 11 });
    });

    it("should keep log snapshots independent of later steps", async () => {
        const run = await engine.runOnce(await selfLoop("count < 3"), { count: 0 });

        expect(run.logs.map((entry) => entry.stateSnapshot)).toEqual([{ count: 1 }, { count: 2 }, { count: 3 }]);
    });

    it("should copy the initial state and freeze the returned run", async () => {
        const initial = { count: 0, nested: { untouched: true } };
        const run = await engine.runOnce(await selfLoop("count < 2"), initial);

        expect(initial).toEqual({ count: 0, nested: { untouched: true } });
        expect(run.state.nested).not.toBe(initial.nested);
        expect(Object.isFrozen(run)).toBe(true);
        expect(Object.isFrozen(run.state)).toBe(true);
        expect(Object.isFrozen(run.logs[0]?.stateSnapshot)).toBe(true);
    });

    it("should produce the same node sequence and state for the same input", async () => {
        const graphId = await selfLoop("count < 4");
        const first = await engine.runOnce(graphId, { count: 1 });
        const second = await engine.runOnce(graphId, { count: 1 });

        expect(second.runId).not.toBe(first.runId);
        expect(second.logs.map((entry) => entry.nodeId)).toEqual(first.logs.map((entry) => entry.nodeId));
        expect(second.state).toEqual(first.state);
    });

    describe("failures", () => {
        it("should throw NotFoundError for an unknown graph without creating a run", async () => {
            const put = vi.spyOn(context.runs, "put");

            await expect(engine.runOnce("nope", {})).rejects.toThrow(new NotFoundError("graph", "nope"));
            expect(put).not.toHaveBeenCalled();
        });

        it("should reject initial state that is not a record", async () => {
            const graphId = await linearGraph();
            await expect(engine.runOnce(graphId, [1, 2])).rejects.toBeInstanceOf(ValidationError);
            await expect(engine.runOnce(graphId, { fn: () => 1 })).rejects.toBeInstanceOf(ValidationError);
        });

        it("should reject a negative or fractional maxSteps", async () => {
            const graphId = await linearGraph();
            await expect(engine.runOnce(graphId, {}, { maxSteps: -1 })).rejects.toBeInstanceOf(ValidationError);
            await expect(engine.runOnce(graphId, {}, { maxSteps: 1.5 })).rejects.toBeInstanceOf(ValidationError);
        });

        it("should fail the run when an edge of an unchecked graph leads to a missing node", async () => {
            const graphs = new UncheckedGraphStore();
            const graphId = await graphs.put({
                id: "broken",
                nodes: [{ id: "A", toolName: "a", config: {} }],
                edges: [{ source: "A", target: "ghost" }],
                startNodeId: "A",
            });

            const run = await new ExecutionEngine({ ...context, graphs }).runOnce(graphId, {});
            expect(run.status).toBe("failed");
            expect(run.currentNodeId).toBe("ghost");
            expect(run.logs).toEqual([
                { nodeId: "A", message: "Executed tool 'a'", stateSnapshot: { a: 1 } },
                { nodeId: "ghost", message: "Node 'ghost' not found in graph", stateSnapshot: { a: 1 } },
            ]);
        });

        it("should treat an unparsable guard on an unvalidated graph as never matching", async () => {
            const graphs = new UncheckedGraphStore();
            const graphId = await graphs.put({
                id: "bad-guard",
                nodes: [{ id: "A", toolName: "a", config: {} }, { id: "B", toolName: "b", config: {} }],
                edges: [{ source: "A", target: "B", condition: "import('fs')" }],
                startNodeId: "A",
            });

            const run = await new ExecutionEngine({ ...context, graphs }).runOnce(graphId, {});
            expect(run.status).toBe("completed");
            expect(run.logs.map((entry) => entry.nodeId)).toEqual(["A"]);
        });

        it.each([
            ["throws", () => { throw new Error("boom"); }, "Tool 'throws' failed: boom"],
            ["array", () => JSON.parse("[1]"), "Tool 'array' failed: Tool 'array' must return a record to merge into state: got array"],
        ])("should fail the run when the %s tool misbehaves", async (toolName, run, message) => {
            context.tools.register(toolName, { run });
            const graphId = await context.graphs.put(new GraphBuilder().addNode("only", toolName).build());

            const result = await engine.runOnce(graphId, { before: true });
            expect(result.status).toBe("failed");
            expect(result.currentNodeId).toBe("only");
            expect(result.logs).toEqual([{ nodeId: "only", message, stateSnapshot: { before: true } }]);
        });

        it("should fail the run when the tool is not registered", async () => {
            const graphId = await context.graphs.put(new GraphBuilder().addNode("only", "unregistered").build());

            const run = await engine.runOnce(graphId, {});
            expect(run.status).toBe("failed");
            expect(run.logs.map((entry) => entry.message)).toEqual([
                "Tool 'unregistered' failed: Tool 'unregistered' not found",
            ]);
        });

        it("should fail the run when an asynchronous tool rejects", async () => {
            context.tools.register("slow-fail", new AsyncFunctionTool(async () => {
                await new Promise((resolve) => setTimeout(resolve, 1));
                throw new Error("timeout");
            }));
            const graphId = await context.graphs.put(new GraphBuilder().addNode("only", "slow-fail").build());

            const run = await engine.runOnce(graphId, {});
            expect(run.logs.map((entry) => entry.message)).toEqual(["Tool 'slow-fail' failed: timeout"]);
        });
    });

    describe("cancellation", () => {
        it("should stop between steps once the signal is aborted", async () => {
            const controller = new AbortController();
            context.tools.register("stop", (state) => {
                controller.abort();
                return increment(state);
            });
            const graphId = await context.graphs.put(
                new GraphBuilder().addNode("loop", "stop").addEdge("loop", "loop").build(),
            );

            const run = await engine.runOnce(graphId, { count: 0 }, { signal: controller.signal });
            expect(run.status).toBe("cancelled");
            expect(run.currentNodeId).toBe("loop");
            expect(run.logs).toEqual([
                { nodeId: "loop", message: "Executed tool 'stop'", stateSnapshot: { count: 1 } },
                { nodeId: "loop", message: "Run cancelled", stateSnapshot: { count: 1 } },
            ]);
        });

        it("should not run any step with an already aborted signal", async () => {
            const controller = new AbortController();
            controller.abort();

            const run = await engine.runOnce(await linearGraph(), {}, { signal: controller.signal });
            expect(run.status).toBe("cancelled");
            expect(run.logs.map((entry) => entry.message)).toEqual(["Run cancelled"]);
        });
    });

    describe("run store", () => {
        it("should write the run on creation and after every step", async () => {
            const put = vi.spyOn(context.runs, "put");

            const run = await engine.runOnce(await linearGraph(), {});

            expect(put.mock.calls.map(([record]) => [record.status, record.logs.length, record.currentNodeId])).toEqual([
                ["running", 0, "A"],
                ["running", 1, "B"],
                ["running", 2, "C"],
                ["completed", 3, null],
            ]);
            expect(await context.runs.get(run.runId)).toEqual(run);
        });

        it("should keep concurrent runs isolated", async () => {
            context.tools.register("slow-increment", new AsyncFunctionTool(async (state) => {
                await new Promise((resolve) => setTimeout(resolve, 1));
                return increment(state);
            }));
            const graphId = await context.graphs.put(
                new GraphBuilder()
                    .addNode("loop", "slow-increment")
                    .addEdge("loop", "loop", "count < limit")
                    .build(),
            );

            const [short, long] = await Promise.all([
                engine.runOnce(graphId, { count: 0, limit: 2 }),
                engine.runOnce(graphId, { count: 10, limit: 15 }),
            ]);

            expect(short.state).toEqual({ count: 2, limit: 2 });
            expect(long.state).toEqual({ count: 15, limit: 15 });
            expect(short.logs).toHaveLength(2);
            expect(long.logs).toHaveLength(5);
            expect((await context.runs.get(short.runId)).state).toEqual({ count: 2, limit: 2 });
            expect((await context.runs.get(long.runId)).state).toEqual({ count: 15, limit: 15 });
        });
    });
});
