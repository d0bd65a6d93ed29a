import { z } from "zod";
import { GraphValidationError, GuardSyntaxError, describeError } from "../errors";
import { Guard } from "../conditions/guard";
import { cloneState, deepFreeze } from "../util/clone-state";
import { formatIssues } from "../util/format-issues";

export interface NodeDefinition {
    /** Unique within the graph. */
    id: string;
    /** Name the tool is registered under. */
    toolName: string;
    /** Opaque to the engine. */
    config: Record<string, unknown>;
}

export interface EdgeDefinition {
    source: string;
    target: string;
    /** Guard expression; an edge without one is an unconditional default. */
    condition?: string;
}

export interface GraphDefinition {
    id: string;
    nodes: NodeDefinition[];
    edges: EdgeDefinition[];
    startNodeId: string;
}

export const NodeDefinitionSchema = z.object({
    id: z.string().min(1),
    toolName: z.string().min(1),
    config: z.record(z.string(), z.unknown()).default({}),
});

export const EdgeDefinitionSchema = z.object({
    source: z.string().min(1),
    target: z.string().min(1),
    condition: z.string().nullish().transform((condition) => condition ?? undefined),
});

export const GraphInputSchema = z.object({
    nodes: z.array(NodeDefinitionSchema).min(1),
    edges: z.array(EdgeDefinitionSchema).default([]),
    startNodeId: z.string().min(1),
});

/** What a caller supplies to create a graph; the id is assigned on creation. */
export type GraphInput = z.input<typeof GraphInputSchema>;

/**
 * Checks a graph's references and guards.
 * Returns every problem found rather than stopping at the first.
 */
export function findGraphIssues(graph: Omit<GraphDefinition, "id">): string[] {
    const issues: string[] = [];
    const nodeIds = new Set<string>();

    for (const node of graph.nodes) {
        if (nodeIds.has(node.id)) {
            issues.push(`Duplicate node id '${node.id}'`);
        }
        nodeIds.add(node.id);
    }

    if (!nodeIds.has(graph.startNodeId)) {
        issues.push(`Start node '${graph.startNodeId}' does not exist`);
    }

    graph.edges.forEach((edge, index) => {
        if (!nodeIds.has(edge.source)) {
            issues.push(`edges.${index}: source '${edge.source}' does not exist`);
        }
        if (!nodeIds.has(edge.target)) {
            issues.push(`edges.${index}: target '${edge.target}' does not exist`);
        }
        if (edge.condition !== undefined) {
            try {
                Guard.parse(edge.condition);
            } catch (error) {
                if (!(error instanceof GuardSyntaxError)) {
                    throw error;
                }
                issues.push(`edges.${index}: invalid condition '${edge.condition}': ${error.message}`);
            }
        }
    });

    return issues;
}

/**
 * Parses and validates an untrusted graph description.
 *
 * @param input - Raw input, e.g. a request body
 * @param id - Id to assign to the resulting graph
 * @returns A deep-frozen graph definition
 * @throws {GraphValidationError} With every shape, reference and guard problem found
 *
 * @example
 * ```typescript
 * const graph = validateGraph({
 *   nodes: [{ id: "check", toolName: "check_quality" }, { id: "fix", toolName: "fix" }],
 *   edges: [{ source: "check", target: "fix", condition: "score < 80" }],
 *   startNodeId: "check",
 * }, "quality-loop");
 * ```
 */
export function validateGraph(input: unknown, id: string): GraphDefinition {
    const parsed = GraphInputSchema.safeParse(input);
    if (!parsed.success) {
        throw new GraphValidationError(formatIssues(parsed.error));
    }

    const graph: GraphDefinition = {
        id,
        nodes: parsed.data.nodes.map((node) => ({ id: node.id, toolName: node.toolName, config: node.config })),
        edges: parsed.data.edges.map((edge) => edge.condition === undefined
            ? { source: edge.source, target: edge.target }
            : { source: edge.source, target: edge.target, condition: edge.condition }),
        startNodeId: parsed.data.startNodeId,
    };

    const issues = findGraphIssues(graph);
    if (issues.length > 0) {
        throw new GraphValidationError(issues);
    }
    try {
        return deepFreeze(cloneState(graph));
    } catch (error) {
        throw new GraphValidationError([`node config must be plain data: ${describeError(error)}`]);
    }
}
