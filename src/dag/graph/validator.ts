/**
 * @file Execution Graph Validator
 *
 * Structural checks on a mapped graph: edges reference existing nodes,
 * every producer precedes its consumers in call order, and there are no
 * cycles. Ordering uses Kahn's algorithm, ties broken by invocation
 * index so the order matches the driver's call order.
 *
 * @module dag/graph
 */

import { ConfigurationError } from '../errors.js';
import type { ExecutionGraph, GraphNode, ValidationResult } from './types.js';

/**
 * Validate a mapped graph for structural correctness.
 */
export function graph_validate(graph: ExecutionGraph): ValidationResult {
    const errors: string[] = [];

    for (const edge of graph.edges) {
        const from: GraphNode | undefined = graph.nodes.get(edge.from);
        const to: GraphNode | undefined = graph.nodes.get(edge.to);
        if (!from || !to) {
            errors.push(`Edge '${edge.from}' → '${edge.to}' references a node that was not mapped`);
            continue;
        }
        if (from.identity.index >= to.identity.index) {
            errors.push(`'${edge.to}' consumes '${edge.artifact}' from '${edge.from}', which runs after it`);
        }
    }

    if (kahn_sort(graph, new Set(graph.nodes.keys())) === null) {
        errors.push('Cycle detected in execution graph');
    }

    return {
        valid: errors.length === 0,
        errors,
    };
}

/**
 * Topological order of `subset` (edges leaving the subset are ignored).
 *
 * @throws ConfigurationError if the subset contains a cycle.
 */
export function executionOrder_compute(graph: ExecutionGraph, subset: Set<string>): string[] {
    const order: string[] | null = kahn_sort(graph, subset);
    if (order === null) {
        throw new ConfigurationError('Cycle detected in execution graph');
    }
    return order;
}

/**
 * Kahn's algorithm over the nodes in `subset`. Returns null on a cycle.
 */
function kahn_sort(graph: ExecutionGraph, subset: Set<string>): string[] | null {
    const inDegree: Map<string, number> = new Map();
    for (const key of subset) {
        if (graph.nodes.has(key)) inDegree.set(key, 0);
    }
    for (const edge of graph.edges) {
        if (inDegree.has(edge.from) && inDegree.has(edge.to)) {
            inDegree.set(edge.to, (inDegree.get(edge.to) ?? 0) + 1);
        }
    }

    const ready: string[] = [];
    for (const [key, degree] of inDegree) {
        if (degree === 0) ready.push(key);
    }

    const order: string[] = [];
    while (ready.length > 0) {
        ready.sort((a: string, b: string): number => nodeIndex_get(graph, a) - nodeIndex_get(graph, b));
        const current: string | undefined = ready.shift();
        if (current === undefined) break;
        order.push(current);

        for (const edge of graph.edges) {
            if (edge.from === current && inDegree.has(edge.to)) {
                const next: number = (inDegree.get(edge.to) ?? 1) - 1;
                inDegree.set(edge.to, next);
                if (next === 0) ready.push(edge.to);
            }
        }
    }

    return order.length < inDegree.size ? null : order;
}

function nodeIndex_get(graph: ExecutionGraph, key: string): number {
    return graph.nodes.get(key)?.identity.index ?? Number.MAX_SAFE_INTEGER;
}
