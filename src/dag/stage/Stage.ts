/**
 * @file Stage Wrapper
 *
 * Builds stages from a declaration and a plain function:
 *
 *     const train = stage_define(
 *         { name: 'train', inputs: ['data'], outputs: ['model'], cachers: [new JsonCacher()] },
 *         (record, { data }) => fit(data),
 *     );
 *     train.call(record);
 *
 * `stageSchema_define` additionally parses the inputs with a zod schema,
 * which gives the body typed inputs.
 *
 * @module dag/stage
 */

import type { z } from 'zod';
import {
    CachersMismatchError,
    ConfigurationError,
    EmptyCachersError,
    InputSignatureError,
    MissingInputError,
} from '../errors.js';
import type { NodeInput } from '../graph/types.js';
import type { RunRecord } from '../record/RunRecord.js';
import type { Cacher } from '../store/cachers.js';
import { invocation_run } from './invoke.js';
import type { OutputDeclaration, StageDeclaration, StageInvocation } from './types.js';

export type StageInputs = Record<string, unknown>;

export type StageBody<I> = (record: RunRecord, inputs: I) => unknown;

export class Stage<I = StageInputs> {
    readonly name: string;
    readonly inputs: string[];
    readonly outputs: OutputDeclaration[];
    readonly cachers: Cacher[] | null;
    readonly suppress_missing_inputs: boolean;

    constructor(
        declaration: StageDeclaration,
        private readonly body: StageBody<I>,
        private readonly inputs_parse: (raw: StageInputs) => I,
    ) {
        declaration_validate(declaration);
        this.name = declaration.name;
        this.inputs = declaration.inputs ?? [];
        this.outputs = declaration.outputs ?? [];
        this.cachers = declaration.cachers ?? null;
        this.suppress_missing_inputs = declaration.suppress_missing_inputs ?? false;
    }

    /**
     * Invoke against a record. `overrides` win over the record's state
     * for the inputs they name.
     */
    call(record: RunRecord, overrides: StageInputs = {}): StageInvocation {
        return invocation_run({
            name: this.name,
            outputs: this.outputs,
            cachers: this.cachers,
            record,
            aggregate: false,
            inputs_declared: true,
            overwrite_extra: false,
            inputs_map: (required: boolean): NodeInput[] => this.inputs_map(record, overrides, required),
            body_run: (): unknown => this.body(record, this.inputs_parse(this.inputs_resolve(record, overrides))),
        });
    }

    private inputs_map(record: RunRecord, overrides: StageInputs, required: boolean): NodeInput[] {
        const nodes: NodeInput[] = [];
        for (const name of this.inputs) {
            if (name in overrides) continue;
            const producer: string | null = record.context.graph.producer_get(record.id, name);
            if (producer !== null || record.state.has(name)) {
                nodes.push({ name, record_id: record.id, producer });
            } else if (required && !this.suppress_missing_inputs) {
                throw this.missingInput_error(record, name);
            }
        }
        return nodes;
    }

    private inputs_resolve(record: RunRecord, overrides: StageInputs): StageInputs {
        const resolved: StageInputs = {};
        for (const name of this.inputs) {
            if (name in overrides) continue;
            if (record.state.has(name)) {
                resolved[name] = record.state.get(name);
            } else if (!this.suppress_missing_inputs) {
                throw this.missingInput_error(record, name);
            }
        }
        return { ...resolved, ...overrides };
    }

    private missingInput_error(record: RunRecord, name: string): MissingInputError {
        return new MissingInputError(
            `Stage '${this.name}' requires input '${name}', which record '${record.name}' does not have`,
            { stage: this.name, input: name, record: record.name },
        );
    }
}

// ─── Definition ─────────────────────────────────────────────────

/**
 * Define a stage whose body receives its inputs as a plain record.
 */
export function stage_define(declaration: StageDeclaration, body: StageBody<StageInputs>): Stage<StageInputs> {
    return new Stage(declaration, body, (raw: StageInputs): StageInputs => raw);
}

/**
 * Define a stage whose inputs are parsed with `schema` before the body
 * runs. A parse failure raises a `ConfigurationError` naming the stage.
 */
export function stageSchema_define<I>(
    declaration: StageDeclaration,
    schema: z.ZodType<I, z.ZodTypeDef, unknown>,
    body: StageBody<I>,
): Stage<I> {
    return new Stage(declaration, body, (raw: StageInputs): I => {
        const parsed = schema.safeParse(raw);
        if (!parsed.success) {
            throw new ConfigurationError(
                `Inputs of stage '${declaration.name}' failed validation: ${parsed.error.message}`,
                { stage: declaration.name },
            );
        }
        return parsed.data;
    });
}

/**
 * Checks made when a stage or aggregate is defined, before any run.
 */
export function declaration_validate(declaration: {
    name: string;
    inputs?: string[];
    outputs?: OutputDeclaration[];
    cachers?: Cacher[];
}): void {
    const { name } = declaration;
    if (name.length === 0) {
        throw new InputSignatureError('Stage name must not be empty');
    }
    const outputs: string[] = (declaration.outputs ?? []).map(
        (output: OutputDeclaration): string => (typeof output === 'string' ? output : output.name),
    );
    names_checkUnique(name, 'input', declaration.inputs ?? []);
    names_checkUnique(name, 'output', outputs);

    if (declaration.cachers === undefined) return;
    if (declaration.cachers.length === 0) {
        throw new EmptyCachersError(
            `Stage '${name}' declares an empty cachers list; omit it to disable caching`,
            { stage: name },
        );
    }
    if (declaration.cachers.length !== outputs.length) {
        throw new CachersMismatchError(
            `Stage '${name}' declares ${declaration.cachers.length} cachers for ${outputs.length} outputs; `
            + 'every output needs a cacher or none may have one',
            { stage: name, cachers: declaration.cachers.length, outputs: outputs.length },
        );
    }
}

function names_checkUnique(stage: string, kind: 'input' | 'output', names: string[]): void {
    const seen: Set<string> = new Set();
    for (const name of names) {
        if (name.length === 0) {
            throw new InputSignatureError(`Stage '${stage}' declares an empty ${kind} name`, { stage });
        }
        if (seen.has(name)) {
            throw new InputSignatureError(`Stage '${stage}' declares ${kind} '${name}' twice`, { stage, [kind]: name });
        }
        seen.add(name);
    }
}
