/**
 * @file Stage Type Definitions
 *
 * A stage is a descriptor (name, declared inputs and outputs, cachers,
 * flags) wrapped around a plain function. The wrapper's invocation logic
 * reads the descriptor; the function only sees its record and inputs.
 *
 * Invocation state machine:
 *
 *     pending → mapped                               (mapping phase)
 *     pending → cache_hit → done
 *     pending → executing → cached → done
 *     pending → executing → uncached_complete → done
 *
 * @module dag/stage
 */

import type { Cacher } from '../store/cachers.js';
import type { StageIdentity } from '../graph/types.js';

// ─── Outputs ────────────────────────────────────────────────────

/**
 * @property auto_resolve - When false, reading the artifact returns the handle
 */
export interface LazyOutputOptions {
    auto_resolve?: boolean;
}

/** Output replaced by a lazy handle as soon as it has been saved. */
export interface LazyOutput {
    kind: 'lazy';
    name: string;
    auto_resolve: boolean;
}

export type OutputDeclaration = string | LazyOutput;

/**
 * Declare a lazy output:
 *
 *     outputs: ['metrics', lazy('model')]
 */
export function lazy(name: string, options: LazyOutputOptions = {}): LazyOutput {
    return { kind: 'lazy', name, auto_resolve: options.auto_resolve ?? true };
}

/** One output after the run's lazy settings have been applied. */
export interface ResolvedOutput {
    name: string;
    lazy: boolean;
    auto_resolve: boolean;
    cacher: Cacher | null;
}

// ─── Declarations ───────────────────────────────────────────────

/**
 * @property name - Stage name; part of every cache key it writes
 * @property inputs - Artifact names read from the record's state
 * @property outputs - Artifact names written, in return order
 * @property cachers - One per output, or omitted for no caching
 * @property suppress_missing_inputs - Leave absent inputs out of the inputs
 *           object instead of raising, so the body's own defaults apply
 */
export interface StageDeclaration {
    name: string;
    inputs?: string[];
    outputs?: OutputDeclaration[];
    cachers?: Cacher[];
    suppress_missing_inputs?: boolean;
}

/**
 * As a stage, except that `inputs` are read from each contributing
 * record. Omitting `inputs` makes the run graph non-prunable.
 */
export interface AggregateDeclaration {
    name: string;
    inputs?: string[];
    outputs?: OutputDeclaration[];
    cachers?: Cacher[];
}

// ─── Invocation ─────────────────────────────────────────────────

export type StageState =
    | 'pending'
    | 'mapped'
    | 'cache_hit'
    | 'executing'
    | 'cached'
    | 'uncached_complete'
    | 'done';

/**
 * How a call ended.
 *
 * - mapped: mapping phase, body disabled
 * - cache_hit: outputs loaded from the cache
 * - cached / uncached_complete: body ran, outputs saved / not saved
 * - deferred: outside the must-execute set; lazy handles onto cached outputs
 * - skipped: outside the must-execute set with nothing cached, or the record had failed
 * - failed: body raised under continue_on_error
 */
export type StageOutcome =
    | 'mapped'
    | 'cache_hit'
    | 'cached'
    | 'uncached_complete'
    | 'deferred'
    | 'skipped'
    | 'failed';

export interface StageInvocation {
    identity: StageIdentity;
    record_id: number;
    record_name: string;
    trace: StageState[];
    outcome: StageOutcome;
}
