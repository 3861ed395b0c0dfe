/**
 * @file Procedure
 *
 * An ordered list of stages run against one record. An aggregate may
 * only open a procedure, since it is the step that creates the record's
 * content from other records.
 *
 * @module dag/stage
 */

import { ConfigurationError } from '../errors.js';
import type { Parameters } from '../fingerprint/parameters.js';
import type { RunRecord } from '../record/RunRecord.js';
import type { RunContext } from '../run/RunContext.js';
import { Aggregate } from './Aggregate.js';
import type { StageInvocation } from './types.js';

/** Anything callable against a single record. */
export interface ProcedureStep {
    readonly name: string;
    call(record: RunRecord): StageInvocation;
}

export class Procedure {
    constructor(readonly name: string, readonly steps: ProcedureStep[]) {
        if (steps.length === 0) {
            throw new ConfigurationError(`Procedure '${name}' has no steps`, { procedure: name });
        }
        steps.forEach((step: ProcedureStep, index: number): void => {
            if (index > 0 && step instanceof Aggregate) {
                throw new ConfigurationError(
                    `Procedure '${name}': aggregate '${step.name}' must be the first step`,
                    { procedure: name, step: step.name },
                );
            }
        });
    }

    call(record: RunRecord): StageInvocation[] {
        return this.steps.map((step: ProcedureStep): StageInvocation => step.call(record));
    }

    /** Create a record for `params` and run every step against it. */
    run(context: RunContext, params: Parameters | null = null): RunRecord {
        const record: RunRecord = context.record_create(params);
        this.call(record);
        return record;
    }
}
