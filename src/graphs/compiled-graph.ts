import { type GuardedEdge } from "../conditions/select-edge";
import { Guard, UnparsableGuard } from "../conditions/guard";
import { GuardSyntaxError } from "../errors";
import { type EdgeDefinition, type GraphDefinition, type NodeDefinition } from "./definition";

export interface CompiledEdge extends GuardedEdge {
    condition?: string;
}

function compileEdge(edge: EdgeDefinition): CompiledEdge {
    if (edge.condition === undefined) {
        return { source: edge.source, target: edge.target };
    }
    try {
        return { ...edge, guard: Guard.parse(edge.condition) };
    } catch (error) {
        if (!(error instanceof GuardSyntaxError)) {
            throw error;
        }
        return { ...edge, guard: new UnparsableGuard(edge.condition, error) };
    }
}

/**
 * Lookup structure the engine builds once per run: nodes by id and outgoing
 * edges by source, each list kept in declaration order, guards pre-parsed.
 *
 * Compilation never rejects a graph. References are checked when a graph is
 * created; a graph that bypassed that check fails at run time instead, on the
 * missing node or the unparsable guard.
 */
export class CompiledGraph {
    private readonly nodes = new Map<string, NodeDefinition>();
    private readonly outgoing = new Map<string, CompiledEdge[]>();

    private constructor(public readonly definition: GraphDefinition) {
        for (const node of definition.nodes) {
            // First declaration wins on duplicate ids.
            if (!this.nodes.has(node.id)) {
                this.nodes.set(node.id, node);
            }
        }
        for (const edge of definition.edges) {
            const edges = this.outgoing.get(edge.source) ?? [];
            edges.push(compileEdge(edge));
            this.outgoing.set(edge.source, edges);
        }
    }

    static compile(definition: GraphDefinition): CompiledGraph {
        return new CompiledGraph(definition);
    }

    get id(): string {
        return this.definition.id;
    }

    get startNodeId(): string {
        return this.definition.startNodeId;
    }

    node(id: string): NodeDefinition | undefined {
        return this.nodes.get(id);
    }

    edgesFrom(id: string): readonly CompiledEdge[] {
        return this.outgoing.get(id) ?? [];
    }
}
