/**
 * @file Run Planner Tests
 *
 * End-to-end runs over an in-memory backend: two-phase planning and
 * pruning, overwrite propagation, sequential fallback, failure policy,
 * dry and store-full modes, parallel slices and provenance.
 *
 * @module dag/run
 */

import { describe, it, expect } from 'vitest';
import { RunContext } from './RunContext.js';
import { RunPlanner } from './RunPlanner.js';
import type { Driver } from './RunPlanner.js';
import { paramSets_partition } from './partition.js';
import { MemoryProvenance, ProvenanceBus } from './provenance.js';
import type { ProvenanceEntry } from './provenance.js';
import { Parameters } from '../fingerprint/parameters.js';
import { parameterSet_hash } from '../fingerprint/hasher.js';
import { identity_format } from '../graph/types.js';
import type { RunRecord } from '../record/RunRecord.js';
import { stage_define } from '../stage/Stage.js';
import { aggregate_define } from '../stage/Aggregate.js';
import type { StageInvocation } from '../stage/types.js';
import { MemoryBackend } from '../store/backend/memory.js';
import { JsonCacher } from '../store/cachers.js';
import { ConfigurationError, UndeclaredInputsError } from '../errors.js';
import { Logger } from '../../logging/Logger.js';
import type { LogEvent } from '../../logging/Logger.js';
import type { RunSettingsInput } from '../../config/settings.js';

// ═══════════════════════════════════════════════════════════════════
// Test Fixtures
// ═══════════════════════════════════════════════════════════════════

class SeedParams extends Parameters {
    seed: number = 1;
}

const NOW: Date = new Date(2024, 0, 2, 3, 4, 5);
const STAMP: string = '2024-01-02-T030405';

interface Counters {
    load: number;
    train: number;
    evaluate: number;
    report: number;
}

function seed_get(record: RunRecord): number {
    return record.params instanceof SeedParams ? record.params.seed : 0;
}

/**
 * load → train → evaluate per parameter set, then a report aggregate
 * over every trained model. `train` raises for `failSeed`.
 */
function pipeline_create(failSeed: number | null = null) {
    const counters: Counters = { load: 0, train: 0, evaluate: 0, report: 0 };

    const load = stage_define({ name: 'load', outputs: ['data'], cachers: [new JsonCacher()] }, (record) => {
        counters.load += 1;
        return [seed_get(record), seed_get(record) * 2];
    });
    const train = stage_define(
        { name: 'train', inputs: ['data'], outputs: ['model'], cachers: [new JsonCacher()] },
        (record, { data }) => {
            counters.train += 1;
            if (seed_get(record) === failSeed) throw new Error('diverged');
            return { weights: data };
        },
    );
    const evaluate = stage_define(
        { name: 'evaluate', inputs: ['model'], outputs: ['score'], cachers: [new JsonCacher()] },
        () => {
            counters.evaluate += 1;
            return 0.5;
        },
    );
    const report = aggregate_define(
        { name: 'report', inputs: ['model'], outputs: ['names'], cachers: [new JsonCacher()] },
        (_record, _records, inputs) => {
            counters.report += 1;
            return [...inputs.model.keys()].map((record: RunRecord): string => record.name);
        },
    );

    const perSet: Driver = (context, sets) => {
        for (const set of sets) {
            const record = context.record_create(set);
            load.call(record);
            train.call(record);
            evaluate.call(record);
        }
    };
    const withReport: Driver = (context, sets) => {
        for (const set of sets) {
            const record = context.record_create(set);
            load.call(record);
            train.call(record);
        }
        report.call(context.record_create(null));
    };

    return { counters, perSet, withReport };
}

interface Harness {
    planner: RunPlanner;
    context: RunContext;
    events: LogEvent[];
}

function harness_create(backend: MemoryBackend, settings: RunSettingsInput = {}, provenance?: MemoryProvenance): Harness {
    const logger = new Logger();
    const events: LogEvent[] = [];
    logger.subscribe((event: LogEvent): void => {
        events.push(event);
    });
    const context = new RunContext({ settings: { experiment_name: 'exp', ...settings }, backend, logger, provenance });
    return { planner: new RunPlanner(context), context, events };
}

function outcomes_list(invocations: StageInvocation[]): string[] {
    return invocations.map((invocation: StageInvocation): string => `${identity_format(invocation.identity)}:${invocation.outcome}`);
}

const sets_create = (...seeds: number[]): SeedParams[] =>
    seeds.map((seed: number, i: number): SeedParams => SeedParams.create({ name: `P${i + 1}`, seed }));

// ═══════════════════════════════════════════════════════════════════
// Two-Phase Runs
// ═══════════════════════════════════════════════════════════════════

describe('dag/run/RunPlanner', () => {

    it('should compute each artifact once for parameter sets that differ only by name', () => {
        const { counters, withReport } = pipeline_create();
        const { planner, context } = harness_create(new MemoryBackend());
        const sets = sets_create(1, 1);

        const result = planner.run(withReport, sets, { now: NOW });

        expect(parameterSet_hash(sets[0])).toBe(parameterSet_hash(sets[1]));
        expect(counters).toEqual({ load: 1, train: 1, evaluate: 0, report: 1 });
        expect(outcomes_list(result.invocations)).toEqual([
            'load#0:cached',
            'train#1:cached',
            'load#2:cache_hit',
            'train#3:cache_hit',
            'report#4:cached',
        ]);
        expect(result.records[2].state.get('names')).toEqual(['P1', 'P2']);
        expect(result.reference).toBe(`exp_1_${STAMP}`);
        expect(context.runs?.runs_list().map((entry) => entry.status)).toEqual(['complete']);
    });

    it('should execute nothing but the cached leaf on a repeated run', () => {
        const backend = new MemoryBackend();
        const { counters, withReport } = pipeline_create();
        harness_create(backend).planner.run(withReport, sets_create(1, 1), { now: NOW });

        const result = harness_create(backend).planner.run(withReport, sets_create(1, 1), { now: NOW });

        expect(counters).toEqual({ load: 1, train: 1, evaluate: 0, report: 1 });
        expect(outcomes_list(result.invocations)).toEqual([
            'load#0:deferred',
            'train#1:deferred',
            'load#2:deferred',
            'train#3:deferred',
            'report#4:cache_hit',
        ]);
        expect(result.records[2].state.get('names')).toEqual(['P1', 'P2']);
        expect(result.reference).toBe(`exp_2_${STAMP}`);
    });

    it('should not execute producers of a cached intermediate', () => {
        const backend = new MemoryBackend();
        const { counters, perSet } = pipeline_create();
        const first = harness_create(backend);
        const sets = sets_create(4);
        first.planner.run(perSet, sets, { now: NOW });
        backend.artifact_remove(first.context.gateway.path_resolve(
            { prefix: 'exp', hash: parameterSet_hash(sets[0]), stage: 'evaluate', artifact: 'score' },
            new JsonCacher(),
        ));

        const result = harness_create(backend).planner.run(perSet, sets, { now: NOW });

        expect(result.plan?.order).toEqual(['evaluate#2']);
        expect(outcomes_list(result.invocations)).toEqual([
            'load#0:deferred',
            'train#1:deferred',
            'evaluate#2:cached',
        ]);
        expect(counters).toEqual({ load: 1, train: 1, evaluate: 2, report: 0 });
        expect(result.records[0].state.cell_get('model')?.kind).toBe('lazy');
    });

    it('should execute an overwritten stage and everything downstream of it', () => {
        const backend = new MemoryBackend();
        const { counters, perSet } = pipeline_create();
        harness_create(backend).planner.run(perSet, sets_create(4), { now: NOW });

        const result = harness_create(backend, { overwrite_stages: ['train'] })
            .planner.run(perSet, sets_create(4), { now: NOW });

        expect([...(result.plan?.forced ?? [])]).toEqual(['train#1', 'evaluate#2']);
        expect(outcomes_list(result.invocations)).toEqual([
            'load#0:deferred',
            'train#1:cached',
            'evaluate#2:cached',
        ]);
        expect(counters).toEqual({ load: 1, train: 2, evaluate: 2, report: 0 });
    });

    it('should map a dry plan without running bodies or writing anything', () => {
        const backend = new MemoryBackend();
        const { counters, perSet } = pipeline_create();
        const plan = harness_create(backend).planner.plan(perSet, sets_create(1));

        expect(counters).toEqual({ load: 0, train: 0, evaluate: 0, report: 0 });
        expect(backend.path_exists('data')).toBe(false);
        expect(plan.records_summarize()).toEqual([{
            record_id: 0,
            record_name: 'P1',
            stages: [
                { identity: { stage: 'load', index: 0 }, cached: false, leaf: false, must_execute: true },
                { identity: { stage: 'train', index: 1 }, cached: false, leaf: false, must_execute: true },
                { identity: { stage: 'evaluate', index: 2 }, cached: false, leaf: true, must_execute: true },
            ],
        }]);
    });

    it('should keep the planned identities of calls after a nested one', () => {
        const backend = new MemoryBackend();
        let leafRuns: number = 0;
        const helper = stage_define({ name: 'helper', outputs: ['h'] }, () => 'help');
        const outer = stage_define({ name: 'outer', outputs: ['y'] }, (record) => {
            helper.call(record);
            return 2;
        });
        const leaf = stage_define({ name: 'final', outputs: ['z'], cachers: [new JsonCacher()] }, () => {
            leafRuns += 1;
            return 3;
        });
        const driver: Driver = (context, sets) => {
            const record = context.record_create(sets[0]);
            outer.call(record);
            leaf.call(record);
        };
        const { planner } = harness_create(backend);

        const result = planner.run(driver, sets_create(1), { now: NOW });

        expect(outcomes_list(result.invocations)).toEqual([
            'outer#0/helper#0:uncached_complete',
            'outer#0:uncached_complete',
            'final#1:cached',
        ]);
        expect(leafRuns).toBe(1);
        expect(result.records[0].state.get('z')).toBe(3);
        expect(result.records[0].state.get('h')).toBe('help');
    });

    it('should refuse a mapped graph with a missing input', () => {
        const train = stage_define({ name: 'train', inputs: ['data'], outputs: ['model'] }, () => 1);
        const driver: Driver = (context, sets) => {
            train.call(context.record_create(sets[0]));
        };
        const { planner } = harness_create(new MemoryBackend());
        expect(() => planner.plan(driver, sets_create(1))).toThrow("Stage 'train' requires input 'data'");
    });
});

// ═══════════════════════════════════════════════════════════════════
// Sequential Fallback
// ═══════════════════════════════════════════════════════════════════

describe('dag/run/RunPlanner sequential fallback', () => {

    const load = stage_define({ name: 'load', outputs: ['data'], cachers: [new JsonCacher()] }, () => [1]);
    const count = aggregate_define({ name: 'count', outputs: ['n'] }, (_record, records) => records.length);
    const driver: Driver = (context, sets) => {
        for (const set of sets) load.call(context.record_create(set));
        count.call(context.record_create(null));
    };

    it('should run sequentially when an aggregate omits its inputs', () => {
        const { planner, events } = harness_create(new MemoryBackend());
        const result = planner.run(driver, sets_create(1, 2), { now: NOW });

        expect(result.plan).toBeNull();
        expect(outcomes_list(result.invocations)).toEqual(['load#0:cached', 'load#1:cached', 'count#2:uncached_complete']);
        expect(result.records[2].state.get('n')).toBe(2);
        expect(events.filter((event: LogEvent): boolean => event.level === 'warn').map((event) => event.message)).toEqual([
            'An aggregate does not declare its inputs; falling back to sequential execution',
        ]);
    });

    it('should raise instead under strict planning', () => {
        const { planner, context } = harness_create(new MemoryBackend());
        expect(() => planner.run(driver, sets_create(1), { now: NOW, strict: true })).toThrow(UndeclaredInputsError);
        expect(context.runs?.runs_list().map((entry) => entry.status)).toEqual(['failed']);
    });

    it('should skip planning entirely with dag disabled', () => {
        const { counters, perSet } = pipeline_create();
        const result = harness_create(new MemoryBackend(), { dag: false }).planner.run(perSet, sets_create(1), { now: NOW });
        expect(result.plan).toBeNull();
        expect(counters).toEqual({ load: 1, train: 1, evaluate: 1, report: 0 });
    });
});

// ═══════════════════════════════════════════════════════════════════
// Failures
// ═══════════════════════════════════════════════════════════════════

describe('dag/run/RunPlanner failures', () => {

    it('should abort the run on the first stage failure by default', () => {
        const { withReport } = pipeline_create(2);
        const { planner, context } = harness_create(new MemoryBackend());
        expect(() => planner.run(withReport, sets_create(1, 2), { now: NOW })).toThrow('diverged');
        expect(context.runs?.runs_list().map((entry) => entry.status)).toEqual(['failed']);
    });

    it('should isolate the failing record under continue_on_error', () => {
        const { counters, withReport } = pipeline_create(2);
        const { planner, context } = harness_create(new MemoryBackend(), { continue_on_error: true });
        const result = planner.run(withReport, sets_create(1, 2), { now: NOW });

        expect(result.failures.map((failure) => `${failure.record_name}@${identity_format(failure.identity)}`))
            .toEqual(['P2@train#3']);
        expect(result.records[2].state.get('names')).toEqual(['P1']);
        expect(counters.report).toBe(1);
        expect(context.runs?.runs_list().map((entry) => entry.status)).toEqual(['failed']);
    });
});

// ═══════════════════════════════════════════════════════════════════
// Modes
// ═══════════════════════════════════════════════════════════════════

describe('dag/run/RunPlanner modes', () => {

    it('should write nothing in dry mode', () => {
        const backend = new MemoryBackend();
        const { counters, perSet } = pipeline_create();
        harness_create(backend, { dry: true }).planner.run(perSet, sets_create(1), { now: NOW });
        const result = harness_create(backend, { dry: true }).planner.run(perSet, sets_create(1), { now: NOW });

        expect(counters).toEqual({ load: 2, train: 2, evaluate: 2, report: 0 });
        expect(backend.path_exists('data')).toBe(false);
        expect(result.reference).toBe('exp_unregistered');
    });

    it('should copy tracked entries and run info into a run folder', () => {
        const backend = new MemoryBackend();
        const { perSet } = pipeline_create();
        const sets = sets_create(1);
        const { planner, context } = harness_create(backend, { store_full: true });
        const result = planner.run(perSet, sets, { now: NOW });

        const folder = `data/runs/exp_1_${STAMP}`;
        const loadCopy = `${folder}/exp_${parameterSet_hash(sets[0])}_load_data.json`;
        expect(result.stored).toContain(loadCopy);
        expect(result.stored[result.stored.length - 1]).toBe(`${folder}/run_info.json`);
        expect(backend.artifact_read(loadCopy)?.toString('utf-8')).toBe(JSON.stringify([1, 2], null, 2));

        const info: unknown = JSON.parse(backend.artifact_read(`${folder}/run_info.json`)?.toString('utf-8') ?? 'null');
        expect(info).toMatchObject({ reference: `exp_1_${STAMP}`, param_names: ['P1'], failures: [] });
        expect(context.runs?.runs_list()[0].store_full).toBe(true);
    });

    it('should handle one slice of the parameter sets without registering the run', () => {
        const { perSet } = pipeline_create();
        const sets = sets_create(1, 2, 3);
        const ranges = paramSets_partition(sets.length, 2);
        const { planner, context } = harness_create(new MemoryBackend(), { parallel_mode: true });
        const result = planner.run(perSet, sets, { now: NOW, range: ranges[1] });

        expect(ranges).toEqual([[0, 2], [2, 3]]);
        expect(result.records.map((record) => record.name)).toEqual(['P3']);
        expect(result.reference).toBe('exp_unregistered');
        expect(context.runs?.runs_list()).toEqual([]);
        expect(context.params_registry?.entry_get(parameterSet_hash(sets[2]))?.kind).toBe('params');
    });

    it('should send one provenance entry per executed call', () => {
        const provenance = new MemoryProvenance();
        const { perSet } = pipeline_create();
        const sets = sets_create(5);
        const result = harness_create(new MemoryBackend(), {}, provenance).planner.run(perSet, sets, { now: NOW });

        expect(provenance.entries).toHaveLength(result.invocations.length);
        expect(provenance.entries[0]).toMatchObject({
            identity: { stage: 'load', index: 0 },
            record_name: 'P1',
            params_hash: parameterSet_hash(sets[0]),
            outcome: 'cached',
        });
    });
});

// ═══════════════════════════════════════════════════════════════════
// Partitioning and Provenance Bus
// ═══════════════════════════════════════════════════════════════════

describe('dag/run/partition', () => {

    it('should split into contiguous slices, larger ones first', () => {
        expect(paramSets_partition(5, 2)).toEqual([[0, 3], [3, 5]]);
        expect(paramSets_partition(4, 4)).toEqual([[0, 1], [1, 2], [2, 3], [3, 4]]);
    });

    it('should not return empty slices', () => {
        expect(paramSets_partition(2, 4)).toEqual([[0, 1], [1, 2]]);
        expect(paramSets_partition(0, 3)).toEqual([]);
    });

    it('should reject a non-positive process count', () => {
        expect(() => paramSets_partition(3, 0)).toThrow(ConfigurationError);
    });
});

describe('dag/run/provenance', () => {

    it('should fan entries out to subscribers until they unsubscribe', () => {
        const bus = new ProvenanceBus();
        const received: ProvenanceEntry[] = [];
        const unsubscribe = bus.subscribe((entry: ProvenanceEntry): void => {
            received.push(entry);
        });
        const entry: ProvenanceEntry = {
            identity: { stage: 'load', index: 0 },
            record_id: 0,
            record_name: 'P1',
            params_hash: 'abc',
            params: { name: 'P1' },
            outcome: 'cached',
            timestamp: '2024-01-02T03:04:05.000Z',
        };
        bus.provenance_record(entry);
        unsubscribe();
        bus.provenance_record(entry);
        expect(received).toEqual([entry]);
    });
});
