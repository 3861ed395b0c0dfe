/**
 * @file Reachability Planner
 *
 * Decides which mapped nodes must run in the execution phase.
 *
 *   1. Leaves: nodes whose outputs nothing else consumes.
 *   2. Forced: nodes with an overwrite request, plus everything
 *      downstream of them (their inputs may now be stale).
 *   3. Walk backwards from every leaf. A visited node must execute.
 *      The walk continues into a producer only if that producer is not
 *      fully cached or is forced; a cached producer is left for lazy
 *      loading by whoever reads its outputs.
 *
 * A leaf whose outputs are cached still "executes"; in practice that is
 * an ordinary cache hit.
 *
 * @module dag/graph
 */

import { consumers_index, producers_index } from './ExecutionGraph.js';
import { executionOrder_compute } from './validator.js';
import type {
    ExecutionGraph,
    ExecutionPlan,
    GraphNode,
    RecordSummary,
    StageSummary,
} from './types.js';

/** Nodes whose outputs are never consumed by another mapped node. */
export function leaves_find(graph: ExecutionGraph): Set<string> {
    const consumers: Map<string, Set<string>> = consumers_index(graph);
    const leaves: Set<string> = new Set();
    for (const [key, downstream] of consumers) {
        if (downstream.size === 0) leaves.add(key);
    }
    return leaves;
}

/** Overwrite nodes and their transitive dependents. */
export function forced_compute(graph: ExecutionGraph): Set<string> {
    const consumers: Map<string, Set<string>> = consumers_index(graph);
    const forced: Set<string> = new Set();
    const queue: string[] = [];
    for (const node of graph.nodes.values()) {
        if (node.overwrite) queue.push(node.key);
    }
    while (queue.length > 0) {
        const current: string | undefined = queue.shift();
        if (current === undefined || forced.has(current)) continue;
        forced.add(current);
        for (const next of consumers.get(current) ?? []) {
            queue.push(next);
        }
    }
    return forced;
}

/**
 * Leaves, forced nodes and the must-execute set.
 */
export function mustExecute_compute(graph: ExecutionGraph): {
    leaves: Set<string>;
    forced: Set<string>;
    must_execute: Set<string>;
} {
    const leaves: Set<string> = leaves_find(graph);
    const forced: Set<string> = forced_compute(graph);
    const producers: Map<string, Set<string>> = producers_index(graph);
    const must: Set<string> = new Set();

    const satisfied = (key: string): boolean => {
        const node: GraphNode | undefined = graph.nodes.get(key);
        return node !== undefined && node.cached && !forced.has(key);
    };

    const stack: string[] = [...leaves];
    while (stack.length > 0) {
        const current: string | undefined = stack.pop();
        if (current === undefined || must.has(current)) continue;
        must.add(current);
        if (satisfied(current)) continue;
        for (const producer of producers.get(current) ?? []) {
            if (!satisfied(producer)) stack.push(producer);
        }
    }

    return { leaves, forced, must_execute: must };
}

/**
 * Full plan for a mapped graph.
 */
export function plan_compute(graph: ExecutionGraph): ExecutionPlan {
    const { leaves, forced, must_execute } = mustExecute_compute(graph);
    const order: string[] = executionOrder_compute(graph, must_execute);

    return {
        graph,
        leaves,
        forced,
        must_execute,
        order,
        records_summarize: (): RecordSummary[] => records_summarize(graph, leaves, must_execute),
    };
}

function records_summarize(
    graph: ExecutionGraph,
    leaves: Set<string>,
    must: Set<string>,
): RecordSummary[] {
    const byRecord: Map<number, RecordSummary> = new Map();
    for (const node of graph.nodes.values()) {
        let summary: RecordSummary | undefined = byRecord.get(node.record_id);
        if (!summary) {
            summary = { record_id: node.record_id, record_name: node.record_name, stages: [] };
            byRecord.set(node.record_id, summary);
        }
        const stage: StageSummary = {
            identity: node.identity,
            cached: node.cached,
            leaf: leaves.has(node.key),
            must_execute: must.has(node.key),
        };
        summary.stages.push(stage);
    }
    return [...byRecord.values()].sort((a: RecordSummary, b: RecordSummary): number => a.record_id - b.record_id);
}
