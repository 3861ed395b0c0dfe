/**
 * @file Aggregate Wrapper
 *
 * A stage over several records. Declared inputs are read from each
 * contributing record, giving the body one map per input:
 *
 *     inputs.score → Map { record P1 → 0.91, record P2 → 0.87 }
 *
 * A contributing record without the artifact is left out of that map
 * with a warning. The aggregate's own record is keyed by the combined
 * hash of its contributors, so its cache entry changes whenever the set
 * of contributing parameter sets does.
 *
 * @module dag/stage
 */

import { combinedHash_compute } from '../fingerprint/hasher.js';
import type { NodeInput } from '../graph/types.js';
import type { RunRecord } from '../record/RunRecord.js';
import type { Cacher } from '../store/cachers.js';
import { invocation_run } from './invoke.js';
import { declaration_validate } from './Stage.js';
import type { AggregateDeclaration, OutputDeclaration, StageInvocation } from './types.js';

export type AggregateInputs = Record<string, Map<RunRecord, unknown>>;

export type AggregateBody = (record: RunRecord, records: RunRecord[], inputs: AggregateInputs) => unknown;

export class Aggregate {
    readonly name: string;
    /** Null when the declaration omits `inputs`. */
    readonly inputs: string[] | null;
    readonly outputs: OutputDeclaration[];
    readonly cachers: Cacher[] | null;

    constructor(declaration: AggregateDeclaration, private readonly body: AggregateBody) {
        declaration_validate(declaration);
        this.name = declaration.name;
        this.inputs = declaration.inputs ?? null;
        this.outputs = declaration.outputs ?? [];
        this.cachers = declaration.cachers ?? null;
    }

    /**
     * Invoke against `record`, aggregating over `records` (default: every
     * other record of the run created so far).
     */
    call(record: RunRecord, records?: RunRecord[]): StageInvocation {
        const context = record.context;
        const contributors: RunRecord[] = records
            ?? context.records.filter((candidate: RunRecord): boolean => candidate !== record);
        const contributing: string[] = contributors.map((contributor: RunRecord): string => contributor.contribution_key);

        record.is_aggregate = true;
        record.input_records = contributors;
        record.combined_hash = combinedHash_compute(record.params_hash, contributing, context.settings.hash_algorithm);
        if (context.mode !== 'map') {
            context.combined_register(record.combined_hash, contributing);
        }

        return invocation_run({
            name: this.name,
            outputs: this.outputs,
            cachers: this.cachers,
            record,
            aggregate: true,
            inputs_declared: this.inputs !== null,
            overwrite_extra: contributors.some((contributor: RunRecord): boolean => contributor.overwrite),
            inputs_map: (): NodeInput[] => this.inputs_map(record, contributors),
            body_run: (): unknown => this.body(record, contributors, this.inputs_collect(record, contributors)),
        });
    }

    private inputs_map(record: RunRecord, contributors: RunRecord[]): NodeInput[] {
        const nodes: NodeInput[] = [];
        for (const name of this.inputs ?? []) {
            for (const contributor of contributors) {
                const producer: string | null = record.context.graph.producer_get(contributor.id, name);
                if (producer !== null || contributor.state.has(name)) {
                    nodes.push({ name, record_id: contributor.id, producer });
                }
            }
        }
        return nodes;
    }

    private inputs_collect(record: RunRecord, contributors: RunRecord[]): AggregateInputs {
        const collected: AggregateInputs = {};
        for (const name of this.inputs ?? []) {
            const values: Map<RunRecord, unknown> = new Map();
            for (const contributor of contributors) {
                if (contributor.state.has(name)) {
                    values.set(contributor, contributor.state.get(name));
                } else {
                    record.context.logger.warn(
                        `Aggregate '${this.name}': record '${contributor.name}' has no artifact '${name}'; left out`,
                    );
                }
            }
            collected[name] = values;
        }
        return collected;
    }
}

export function aggregate_define(declaration: AggregateDeclaration, body: AggregateBody): Aggregate {
    return new Aggregate(declaration, body);
}
