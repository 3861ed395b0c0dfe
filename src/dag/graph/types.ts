/**
 * @file Execution Graph Type Definitions
 *
 * The dependency graph is built fresh on every run by the mapping phase:
 * the driver is executed once with every stage body disabled, and each
 * stage call becomes a node. Edges run from the node that produced an
 * artifact in a record to every node that consumed it.
 *
 * Nodes are identified by stage identity, (stage name, invocation
 * ordinal), because the same stage runs once per record. The ordinal is
 * assigned in call order, so it is identical in the mapping and
 * execution phases as long as the driver's control flow is.
 *
 * @module dag/graph
 */

// ─── Stage Identity ─────────────────────────────────────────────

/**
 * @property stage - Stage (or aggregate) name
 * @property index - Ordinal of the call within the run, from 0
 */
/**
 * @property parent - Key of the enclosing call, for a stage called from
 *           inside another stage's body. Such calls are numbered under
 *           their parent and never appear in the mapped graph.
 */
export interface StageIdentity {
    stage: string;
    index: number;
    parent?: string;
}

/**
 * Stable string form, used as the node key: `<stage>#<index>`, or
 * `<parent>/<stage>#<index>` for a nested call.
 */
export function identity_format(identity: StageIdentity): string {
    const own: string = `${identity.stage}#${identity.index}`;
    return identity.parent === undefined ? own : `${identity.parent}/${own}`;
}

// ─── Graph Node ─────────────────────────────────────────────────

/**
 * One consumed artifact.
 *
 * @property name - Artifact name
 * @property record_id - Record the artifact is read from
 * @property producer - Key of the node that wrote it in that record (null: set by the driver, or absent)
 */
export interface NodeInput {
    name: string;
    record_id: number;
    producer: string | null;
}

/**
 * @property key - `identity_format(identity)`
 * @property record_id - Record the stage ran against
 * @property record_name - Parameter-set name of that record ('None' if it has none)
 * @property aggregate - Aggregate node (reads several records)
 * @property inputs_declared - False for an aggregate without declared inputs
 * @property cacheable - The stage has cachers
 * @property cached - Every output is present in the cache for the record's hash
 * @property overwrite - Overwrite requested (global, per stage, or by the parameter set)
 */
export interface GraphNode {
    key: string;
    identity: StageIdentity;
    record_id: number;
    record_name: string;
    aggregate: boolean;
    inputs_declared: boolean;
    inputs: NodeInput[];
    outputs: string[];
    cacheable: boolean;
    cached: boolean;
    overwrite: boolean;
}

export interface GraphEdge {
    from: string;
    to: string;
    artifact: string;
}

/**
 * @property nodes - Node key → node, in call order
 * @property edges - Producer → consumer, one per consumed artifact
 * @property prunable - False when some aggregate did not declare its inputs
 */
export interface ExecutionGraph {
    nodes: Map<string, GraphNode>;
    edges: GraphEdge[];
    prunable: boolean;
}

// ─── Plan ───────────────────────────────────────────────────────

export interface StageSummary {
    identity: StageIdentity;
    cached: boolean;
    leaf: boolean;
    must_execute: boolean;
}

export interface RecordSummary {
    record_id: number;
    record_name: string;
    stages: StageSummary[];
}

/**
 * Outcome of reachability analysis over a graph.
 *
 * @property leaves - Nodes whose outputs no other node consumes
 * @property forced - Overwrite nodes and everything downstream of them
 * @property must_execute - Nodes that run in the execution phase
 * @property order - `must_execute` in a dependency-respecting order
 */
export interface ExecutionPlan {
    graph: ExecutionGraph;
    leaves: Set<string>;
    forced: Set<string>;
    must_execute: Set<string>;
    order: string[];
    records_summarize(): RecordSummary[];
}

export interface ValidationResult {
    valid: boolean;
    errors: string[];
}
