import { createId } from "@paralleldrive/cuid2";
import { GraphValidationError } from "../../errors";
import { type GraphDefinition, findGraphIssues, validateGraph } from "../definition";

/**
 * Keyed storage for graph definitions, shared by every run in the process.
 * Subclasses implement `write`; it must be atomic, so a reader sees either the
 * previous graph or the new one, never a partial write.
 *
 * @abstract
 *
 * @example
 * ```typescript
 * class RedisGraphStore extends GraphStore {
 *   async get(id: string): Promise<GraphDefinition> { ... }
 *   protected async write(graph: GraphDefinition): Promise<void> { ... }
 *   async exists(id: string): Promise<boolean> { ... }
 *   async dispose(): Promise<void> { ... }
 * }
 * ```
 */
export abstract class GraphStore {
    /**
     * @throws {NotFoundError} If no graph is stored under `id`
     */
    abstract get(id: string): Promise<GraphDefinition>;

    abstract exists(id: string): Promise<boolean>;

    /** Releases whatever the store holds. */
    abstract dispose(): Promise<void>;

    /** Persists an already checked graph, replacing any graph with the same id. */
    protected abstract write(graph: GraphDefinition): Promise<void>;

    /**
     * Checks a graph's references and guards, then stores it.
     * Prefer {@link GraphStore.create} for untrusted input.
     *
     * @returns The graph's id
     * @throws {GraphValidationError} If the start node or an edge names a missing node, or a guard does not parse
     */
    async put(graph: GraphDefinition): Promise<string> {
        const issues = findGraphIssues(graph);
        if (issues.length > 0) {
            throw new GraphValidationError(issues);
        }
        await this.write(graph);
        return graph.id;
    }

    /**
     * Validates an untrusted graph description and stores it.
     *
     * @param input - Nodes, edges and start node id
     * @param id - Defaults to a fresh cuid
     * @returns The new graph's id
     * @throws {GraphValidationError} If the description is malformed, references unknown nodes, or has an invalid guard
     */
    async create(input: unknown, id: string = createId()): Promise<string> {
        return await this.put(validateGraph(input, id));
    }
}
