/**
 * @file Run Planner
 *
 * Two-phase execution of a driver over a list of parameter sets:
 *
 *   1. Mapping: run the driver with every stage body disabled. Each call
 *      becomes a graph node with its inputs, outputs and cache status.
 *   2. Execution: compute the must-execute set and run the driver again,
 *      this time for real. Calls outside the set either become lazy
 *      handles onto their cached outputs or are skipped.
 *
 * The driver must make the same calls, in the same order, on both
 * passes: no branching on wall-clock time, randomness, or state that
 * changes between them.
 *
 * With `dag: false`, or when an aggregate omits its inputs, the driver
 * runs once in sequential mode and every call short-circuits on its own.
 *
 * @module dag/run
 */

import path from 'path';
import { ConfigurationError, UndeclaredInputsError } from '../errors.js';
import { hashRepresentations_stringify, parameterSet_hash } from '../fingerprint/hasher.js';
import type { Parameters } from '../fingerprint/parameters.js';
import type { HashOptions } from '../fingerprint/types.js';
import type { ExecutionGraph, ExecutionPlan, ValidationResult } from '../graph/types.js';
import { plan_compute } from '../graph/planner.js';
import { graph_validate } from '../graph/validator.js';
import type { RunRecord } from '../record/RunRecord.js';
import type { StageInvocation } from '../stage/types.js';
import type { RunEntry, RunStatus } from '../store/types.js';
import type { RunContext, RunFailure } from './RunContext.js';
import type { IndexRange } from './partition.js';

export type Driver = (context: RunContext, paramSets: Parameters[]) => void;

/**
 * @property range - Slice of the parameter sets this process handles
 * @property strict - Raise instead of falling back to sequential mode
 *           when an aggregate omits its inputs
 * @property now - Clock for the run reference
 */
export interface RunOptions {
    range?: IndexRange;
    strict?: boolean;
    now?: Date;
}

/**
 * @property plan - Null in sequential mode
 * @property stored - Paths written by store-full
 */
export interface RunResult {
    reference: string;
    plan: ExecutionPlan | null;
    records: RunRecord[];
    invocations: StageInvocation[];
    failures: RunFailure[];
    stored: string[];
}

export class RunPlanner {
    constructor(readonly context: RunContext) {}

    /**
     * Mapping phase only: the graph and its must-execute analysis.
     *
     * @throws ConfigurationError if the mapped graph is malformed.
     */
    plan(driver: Driver, paramSets: Parameters[]): ExecutionPlan {
        const { context } = this;
        context.phase_reset('map');
        try {
            driver(context, paramSets);
        } finally {
            context.mode = 'sequential';
        }
        const graph: ExecutionGraph = context.graph.build();
        const validation: ValidationResult = graph_validate(graph);
        if (!validation.valid) {
            throw new ConfigurationError(`Mapped graph is invalid: ${validation.errors.join('; ')}`);
        }
        return plan_compute(graph);
    }

    /**
     * Full run: registration, both phases, store-full, completion.
     */
    run(driver: Driver, paramSets: Parameters[], options: RunOptions = {}): RunResult {
        const { context } = this;
        const { settings } = context;
        const sets: Parameters[] = options.range ? paramSets.slice(options.range[0], options.range[1]) : paramSets;

        const entry: RunEntry | null = this.run_register(sets, options.now ?? new Date());
        if (entry) context.reference_set(entry.reference);

        let plan: ExecutionPlan | null = null;
        try {
            if (settings.dag) {
                plan = this.plan(driver, sets);
                if (!plan.graph.prunable) {
                    if (options.strict) {
                        throw new UndeclaredInputsError(
                            'An aggregate does not declare its inputs; the run cannot be planned',
                        );
                    }
                    context.logger.warn(
                        'An aggregate does not declare its inputs; falling back to sequential execution',
                    );
                    plan = null;
                }
            }
            context.phase_reset(plan ? 'execute' : 'sequential', plan);
            driver(context, sets);
        } catch (error: unknown) {
            if (entry) context.runs?.run_finish(entry.reference, 'failed');
            throw error;
        }

        const stored: string[] = settings.store_full ? this.run_storeFull(sets) : [];
        const status: RunStatus = context.failures.length > 0 ? 'failed' : 'complete';
        if (entry) context.runs?.run_finish(entry.reference, status);

        return {
            reference: context.reference_get(),
            plan,
            records: [...context.records],
            invocations: [...context.invocations],
            failures: [...context.failures],
            stored,
        };
    }

    /**
     * Register the parameter sets and the run. Nothing is registered in
     * dry mode; a parallel slice registers its parameter sets only.
     */
    private run_register(sets: Parameters[], now: Date): RunEntry | null {
        const { context } = this;
        const hashOptions: HashOptions = context.hashOptions_get();
        const hashes: string[] = sets.map((set: Parameters): string => parameterSet_hash(set, hashOptions));
        sets.forEach((set: Parameters, i: number): void => {
            context.params_registry?.params_register(hashes[i], hashRepresentations_stringify(set, hashOptions));
        });
        if (!context.runs || context.settings.parallel_mode) return null;
        return context.runs.run_start(
            {
                experiment_name: context.settings.experiment_name,
                param_names: sets.map((set: Parameters): string => set.name),
                hashes,
                store_full: context.settings.store_full,
            },
            now,
        );
    }

    /**
     * Copy tracked entries into `<runs_path>/<reference>/` and write
     * `run_info.json` beside them.
     */
    private run_storeFull(sets: Parameters[]): string[] {
        const { context } = this;
        if (context.settings.dry) return [];
        const target: string = path.join(context.settings.runs_path, context.reference_get());
        const stored: string[] = context.gateway.run_storeFull(target);
        const infoPath: string = path.join(target, 'run_info.json');
        const info = {
            reference: context.reference_get(),
            experiment_name: context.settings.experiment_name,
            param_names: sets.map((set: Parameters): string => set.name),
            settings: context.settings,
            failures: context.failures.map((failure: RunFailure) => ({
                stage: failure.identity.stage,
                index: failure.identity.index,
                record_name: failure.record_name,
            })),
        };
        context.backend.artifact_write(infoPath, JSON.stringify(info, null, 2));
        return [...stored, infoPath];
    }
}
