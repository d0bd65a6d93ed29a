import { createId } from "@paralleldrive/cuid2";
import { GraphValidationError } from "../errors";
import { type EdgeDefinition, type GraphDefinition, type NodeDefinition, validateGraph } from "./definition";

/**
 * Fluent way to declare a graph in code.
 * The result goes through the same validation as graphs created from untrusted
 * input, so references and guards are checked in `build()`.
 *
 * @class GraphBuilder
 *
 * @example
 * ```typescript
 * const graph = new GraphBuilder()
 *   .addNode("extract", "extract_functions")
 *   .addNode("complexity", "check_complexity")
 *   .addNode("suggest", "suggest_improvements")
 *   .addEdge("extract", "complexity")
 *   .addEdge("complexity", "suggest")
 *   .addEdge("suggest", "complexity", "state.get('quality_score', 0) < state.get('threshold', 80)")
 *   .setStart("extract")
 *   .build("code_review");
 *
 * await graphs.put(graph);
 * ```
 */
export class GraphBuilder {
    private readonly nodes: NodeDefinition[] = [];
    private readonly edges: EdgeDefinition[] = [];
    private startNodeId?: string;

    /**
     * Adds a node bound to a tool. The first node added becomes the start node
     * unless {@link GraphBuilder.setStart} says otherwise.
     *
     * @param {string} id - Unique node id
     * @param {string} toolName - Name of the tool in the registry
     * @param {Record<string, unknown>} [config] - Opaque per-node settings
     * @returns {this} The builder for chaining
     * @throws {GraphValidationError} If a node with this id was already added
     */
    addNode(id: string, toolName: string, config: Record<string, unknown> = {}): this {
        if (this.nodes.some((node) => node.id === id)) {
            throw new GraphValidationError([`Duplicate node id '${id}'`]);
        }
        this.nodes.push({ id, toolName, config });
        return this;
    }

    /**
     * Adds an edge. Edges leaving the same node are tried in the order added.
     *
     * @param {string} source - Node the edge leaves
     * @param {string} target - Node the edge enters
     * @param {string} [condition] - Guard expression; omit for an unconditional edge
     * @returns {this} The builder for chaining
     */
    addEdge(source: string, target: string, condition?: string): this {
        this.edges.push(condition === undefined ? { source, target } : { source, target, condition });
        return this;
    }

    setStart(nodeId: string): this {
        this.startNodeId = nodeId;
        return this;
    }

    /**
     * @param {string} [id] - Graph id; a fresh cuid when omitted
     * @returns {GraphDefinition} A validated, frozen definition
     * @throws {GraphValidationError} If the graph is empty, references unknown nodes, or has an invalid guard
     */
    build(id: string = createId()): GraphDefinition {
        return validateGraph({
            nodes: this.nodes,
            edges: this.edges,
            startNodeId: this.startNodeId ?? this.nodes[0]?.id ?? "",
        }, id);
    }
}
