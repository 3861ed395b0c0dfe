/**
 * @file Execution Graph Builder
 *
 * Collects nodes during the mapping phase and derives the edges. Each
 * record keeps its own artifact → producer table, since artifact names
 * are a per-record namespace.
 *
 * @module dag/graph
 */

import type { ExecutionGraph, GraphEdge, GraphNode } from './types.js';

export class GraphBuilder {
    private readonly nodes: Map<string, GraphNode> = new Map();
    private readonly producers: Map<number, Map<string, string>> = new Map();
    private prunable: boolean = true;

    /** Key of the node that last produced `artifact` in a record, if any. */
    producer_get(recordId: number, artifact: string): string | null {
        return this.producers.get(recordId)?.get(artifact) ?? null;
    }

    /**
     * Add a node and register it as the producer of its outputs in its
     * own record. Inputs must already carry their producers.
     */
    node_add(node: GraphNode): void {
        this.nodes.set(node.key, node);
        let table: Map<string, string> | undefined = this.producers.get(node.record_id);
        if (!table) {
            table = new Map();
            this.producers.set(node.record_id, table);
        }
        for (const output of node.outputs) {
            table.set(output, node.key);
        }
        if (node.aggregate && !node.inputs_declared) {
            this.prunable = false;
        }
    }

    /** Copy a record's producer table onto a record branched from it. */
    record_branch(sourceId: number, targetId: number): void {
        const table: Map<string, string> | undefined = this.producers.get(sourceId);
        this.producers.set(targetId, new Map(table ?? []));
    }

    build(): ExecutionGraph {
        const edges: GraphEdge[] = [];
        for (const node of this.nodes.values()) {
            for (const input of node.inputs) {
                if (input.producer !== null && this.nodes.has(input.producer)) {
                    edges.push({ from: input.producer, to: node.key, artifact: input.name });
                }
            }
        }
        return { nodes: new Map(this.nodes), edges, prunable: this.prunable };
    }
}

// ─── Adjacency ──────────────────────────────────────────────────

/** Node key → keys of the nodes it consumes from. */
export function producers_index(graph: ExecutionGraph): Map<string, Set<string>> {
    const index: Map<string, Set<string>> = new Map();
    for (const key of graph.nodes.keys()) index.set(key, new Set());
    for (const edge of graph.edges) {
        index.get(edge.to)?.add(edge.from);
    }
    return index;
}

/** Node key → keys of the nodes that consume from it. */
export function consumers_index(graph: ExecutionGraph): Map<string, Set<string>> {
    const index: Map<string, Set<string>> = new Map();
    for (const key of graph.nodes.keys()) index.set(key, new Set());
    for (const edge of graph.edges) {
        index.get(edge.from)?.add(edge.to);
    }
    return index;
}
