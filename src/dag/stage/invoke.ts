/**
 * @file Stage Invocation
 *
 * The call protocol shared by stages and aggregates. The wrappers supply
 * their inputs (as graph edges for the mapping phase, and as resolved
 * values for the body); everything else happens here:
 *
 *   1. Take the next stage identity; a nested call is numbered under
 *      its parent and warned about.
 *   2. Mapping phase: record the node and stop.
 *   3. Outside the must-execute set: lazy handles onto cached outputs,
 *      or nothing if there are none.
 *   4. Cache short-circuit unless an overwrite applies.
 *   5. Run the body, split its return value, commit and save outputs.
 *
 * @module dag/stage
 */

import { errorMessage_get, OutputSignatureError } from '../errors.js';
import { identity_format } from '../graph/types.js';
import type { ExecutionPlan, NodeInput, StageIdentity } from '../graph/types.js';
import type { ParamsDump } from '../fingerprint/types.js';
import type { RunRecord } from '../record/RunRecord.js';
import type { RunContext } from '../run/RunContext.js';
import { LazyHandle } from '../state/LazyHandle.js';
import { SerializedCacher } from '../store/cachers.js';
import type { Cacher } from '../store/cachers.js';
import type { ArtifactMetadata, CacheKey } from '../store/types.js';
import type { Logger } from '../../logging/Logger.js';
import type {
    OutputDeclaration,
    ResolvedOutput,
    StageInvocation,
    StageOutcome,
} from './types.js';

/**
 * What a wrapper hands to `invocation_run`.
 *
 * @property overwrite_extra - Overwrite requested by something other than the
 *           settings or the record's own set (an aggregate's contributors)
 * @property inputs_map - Inputs as graph edges. With `required`, raises if a
 *           required input can never be present
 * @property body_run - Resolve inputs and run the body
 */
export interface InvocationTarget {
    name: string;
    outputs: OutputDeclaration[];
    cachers: Cacher[] | null;
    record: RunRecord;
    aggregate: boolean;
    inputs_declared: boolean;
    overwrite_extra: boolean;
    inputs_map(required: boolean): NodeInput[];
    body_run(): unknown;
}

type CachedOutput = ResolvedOutput & { cacher: Cacher };

/**
 * Run one stage or aggregate call against its record.
 */
export function invocation_run(target: InvocationTarget): StageInvocation {
    const { record } = target;
    const context: RunContext = record.context;
    const identity: StageIdentity = context.identity_next(target.name);
    const nodeKey: string = identity_format(identity);
    const nested: boolean = identity.parent !== undefined;
    const log: Logger = context.logger.child(`[${record.name}] `);
    const invocation: StageInvocation = {
        identity,
        record_id: record.id,
        record_name: record.name,
        trace: ['pending'],
        outcome: 'skipped',
    };

    if (nested && context.stage_active !== null) {
        log.warn(
            `Stage '${target.name}' was called from inside stage '${context.stage_active}'; `
            + 'nested calls are invisible to the mapping phase',
        );
    }

    if (record.failure !== null) {
        log.debug(`${nodeKey}: skipped, record failed at ${identity_format(record.failure.identity)}`);
        return invocation_finish(context, record, invocation, 'skipped');
    }

    const outputs: ResolvedOutput[] = outputs_resolve(target, context);
    const keys: CacheKey[] = outputs.map((output: ResolvedOutput): CacheKey => ({
        prefix: context.prefix_get(),
        hash: record.hash,
        stage: target.name,
        artifact: output.name,
    }));
    const cachedOutputs: CachedOutput[] = outputs.filter(
        (output: ResolvedOutput): output is CachedOutput => output.cacher !== null,
    );
    const cacheable: boolean = outputs.length > 0 && cachedOutputs.length === outputs.length;
    const cached: boolean = cacheable && cachedOutputs.every(
        (output: CachedOutput, i: number): boolean => context.gateway.exists(keys[i], output.cacher),
    );
    const overwrite: boolean = context.overwrite_requested(target.name, record) || target.overwrite_extra;
    const forced: boolean = overwrite || (!nested && (context.plan?.forced.has(nodeKey) ?? false));
    const hit: boolean = cached && !forced;

    // ─── Mapping ────────────────────────────────────────────────

    if (context.mode === 'map') {
        context.graph.node_add({
            key: nodeKey,
            identity,
            record_id: record.id,
            record_name: record.name,
            aggregate: target.aggregate,
            inputs_declared: target.inputs_declared,
            inputs: target.inputs_map(!hit),
            outputs: outputs.map((output: ResolvedOutput): string => output.name),
            cacheable,
            cached,
            overwrite,
        });
        record.stage_log.push(identity);
        invocation.trace.push('mapped');
        return invocation_finish(context, record, invocation, 'mapped');
    }

    // ─── Plan Gating ────────────────────────────────────────────

    // Nested calls were never mapped; they fall through to the cache check.
    const plan: ExecutionPlan | null = context.mode === 'execute' && !nested ? context.plan : null;
    if (plan !== null && !plan.must_execute.has(nodeKey)) {
        record.stage_log.push(identity);
        if (!cached) {
            log.debug(`${nodeKey}: not needed by any result, skipped`);
            return invocation_finish(context, record, invocation, 'skipped');
        }
        cachedOutputs.forEach((output: CachedOutput, i: number): void => {
            record.state.lazy_set(
                output.name,
                new LazyHandle(output.name, keys[i], output.cacher, context.gateway, output.auto_resolve),
            );
        });
        log.debug(`${nodeKey}: cached, left for lazy loading`);
        return invocation_finish(context, record, invocation, 'deferred');
    }

    // ─── Cache Short-Circuit ────────────────────────────────────

    if (hit) {
        invocation.trace.push('cache_hit');
        cachedOutputs.forEach((output: CachedOutput, i: number): void => {
            if (output.lazy) {
                record.state.lazy_set(
                    output.name,
                    new LazyHandle(output.name, keys[i], output.cacher, context.gateway, output.auto_resolve),
                );
            } else {
                record.state.set(output.name, context.gateway.load(keys[i], output.cacher));
            }
        });
        record.stage_log.push(identity);
        log.debug(`${nodeKey}: loaded from cache`);
        return invocation_finish(context, record, invocation, 'cache_hit');
    }

    // ─── Execution ──────────────────────────────────────────────

    invocation.trace.push('executing');
    const previous: string | null = context.stage_active;
    const previousNode: string | null = context.node_active;
    context.stage_active = target.name;
    context.node_active = nodeKey;
    const previousRecordStage: string | null = record.stage_active;
    record.stage_active = target.name;
    let result: unknown;
    try {
        result = target.body_run();
    } catch (error: unknown) {
        log.error(`Stage ${nodeKey} failed for record '${record.name}': ${errorMessage_get(error)}`);
        if (!context.settings.continue_on_error) throw error;
        record.failure = { identity, error };
        context.failure_add({ identity, record_id: record.id, record_name: record.name, error });
        return invocation_finish(context, record, invocation, 'failed');
    } finally {
        context.stage_active = previous;
        context.node_active = previousNode;
        record.stage_active = previousRecordStage;
    }

    const values: unknown[] = outputs_split(target.name, outputs.length, result);
    record.stage_log.push(identity);
    outputs.forEach((output: ResolvedOutput, i: number): void => {
        record.state.set(output.name, values[i]);
    });

    if (!cacheable) {
        invocation.trace.push('uncached_complete');
        return invocation_finish(context, record, invocation, 'uncached_complete');
    }

    const params: ParamsDump = record.params_dump();
    const timestamp: string = new Date().toISOString();
    cachedOutputs.forEach((output: CachedOutput, i: number): void => {
        const metadata: ArtifactMetadata = {
            artifact_name: output.name,
            stage: target.name,
            record_name: record.name,
            params_hash: record.hash,
            params,
            stage_chain: record.stage_log.map((entry: StageIdentity): string => entry.stage),
            run_reference: context.reference_get(),
            cacher: output.cacher.kind,
            timestamp,
        };
        context.gateway.save(keys[i], output.cacher, values[i], metadata);
        if (output.lazy && context.gateway.writable) {
            record.state.lazy_set(
                output.name,
                new LazyHandle(output.name, keys[i], output.cacher, context.gateway, output.auto_resolve),
            );
        }
    });
    invocation.trace.push('cached');
    return invocation_finish(context, record, invocation, 'cached');
}

// ─── Outputs ────────────────────────────────────────────────────

/**
 * Apply the run's lazy settings to a declaration. Under `lazy`, a stage
 * without cachers gets a serialized cacher per output.
 */
export function outputs_resolve(
    target: Pick<InvocationTarget, 'name' | 'outputs' | 'cachers'>,
    context: RunContext,
): ResolvedOutput[] {
    const { lazy: forceLazy, ignore_lazy } = context.settings;
    let cachers: Cacher[] | null = target.cachers;
    if (forceLazy && !ignore_lazy && cachers === null && target.outputs.length > 0) {
        context.warning_emitOnce(
            `Stage '${target.name}' declares no cachers; lazy mode stores its outputs with the serialized cacher`,
        );
        cachers = target.outputs.map((): Cacher => new SerializedCacher());
    }

    return target.outputs.map((declaration: OutputDeclaration, i: number): ResolvedOutput => {
        const name: string = typeof declaration === 'string' ? declaration : declaration.name;
        const declaredLazy: boolean = typeof declaration !== 'string';
        const auto_resolve: boolean = typeof declaration === 'string' ? true : declaration.auto_resolve;
        const isLazy: boolean = !ignore_lazy && (forceLazy || declaredLazy);
        const cacher: Cacher | null = cachers?.[i] ?? null;
        if (isLazy && cacher === null) {
            throw new OutputSignatureError(
                `Output '${name}' of stage '${target.name}' is lazy but the stage declares no cachers`,
                { stage: target.name, output: name },
            );
        }
        return { name, lazy: isLazy, auto_resolve, cacher };
    });
}

/**
 * Split a body's return value into one value per declared output.
 * No outputs: the value is ignored. One: the value itself. Several: an
 * array of exactly that length.
 */
export function outputs_split(stage: string, count: number, result: unknown): unknown[] {
    if (count === 0) return [];
    if (count === 1) return [result];
    if (!Array.isArray(result) || result.length !== count) {
        const returned: string = Array.isArray(result) ? `${result.length} values` : 'a single value';
        throw new OutputSignatureError(
            `Stage '${stage}' returned ${returned} but declares ${count} outputs`,
            { stage, declared: count },
        );
    }
    return result;
}

function invocation_finish(
    context: RunContext,
    record: RunRecord,
    invocation: StageInvocation,
    outcome: StageOutcome,
): StageInvocation {
    invocation.outcome = outcome;
    if (outcome === 'cache_hit' || outcome === 'cached' || outcome === 'uncached_complete' || outcome === 'deferred') {
        invocation.trace.push('done');
    }
    if (outcome === 'mapped') return invocation;

    context.invocations.push(invocation);
    context.provenance.provenance_record({
        identity: invocation.identity,
        record_id: record.id,
        record_name: record.name,
        params_hash: record.hash,
        params: record.params_dump(),
        outcome,
        timestamp: new Date().toISOString(),
    });
    return invocation;
}
