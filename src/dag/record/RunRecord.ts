/**
 * @file Run Record
 *
 * Working memory for one parameter set (or one aggregation) within a
 * run: its state container, the stages it has passed through, and for
 * aggregate records the combined hash of the records it was built from.
 *
 * Records are created through the run context so that their ids follow
 * creation order; the mapping and execution phases therefore see the
 * same ids for the same driver.
 *
 * @module dag/record
 */

import { hashRepresentations_stringify, parameterSet_hash } from '../fingerprint/hasher.js';
import type { Parameters } from '../fingerprint/parameters.js';
import type { ParamsDump } from '../fingerprint/types.js';
import { StateContainer } from '../state/StateContainer.js';
import type { StageIdentity } from '../graph/types.js';
import type { CacheKey, CacherOptions } from '../store/types.js';
import type { RunContext } from '../run/RunContext.js';

/**
 * @property identity - Stage call that failed
 * @property error - What it threw
 */
export interface RecordFailure {
    identity: StageIdentity;
    error: unknown;
}

/**
 * Options for stage-scoped extra paths.
 *
 * @property subdir - Subdirectory of the cache root
 * @property prefix - Replaces the experiment prefix
 * @property track - Copy into store-full run folders (default true)
 * @property extension - Appended to the file name (e.g. '.png')
 */
export interface RecordPathOptions {
    subdir?: string;
    prefix?: string;
    track?: boolean;
    extension?: string;
}

export class RunRecord {
    readonly state: StateContainer;
    readonly stage_log: StageIdentity[] = [];
    /** Set by an aggregate: hash of the records it consumed. */
    combined_hash: string | null = null;
    /** Records an aggregate consumed; empty for ordinary records. */
    input_records: RunRecord[] = [];
    is_aggregate: boolean = false;
    /** First failure under continue_on_error; later stage calls are skipped. */
    failure: RecordFailure | null = null;
    /** Name of the stage currently executing against this record. */
    stage_active: string | null = null;

    constructor(
        readonly context: RunContext,
        readonly id: number,
        readonly params: Parameters | null,
        state?: StateContainer,
    ) {
        this.state = state ?? new StateContainer({ retain_lazy: context.settings.retain_lazy });
    }

    /** Parameter-set name, or 'None'. */
    get name(): string {
        return this.params ? this.params.name : 'None';
    }

    /**
     * Hash used in cache keys: the parameter-set fingerprint, or the
     * combined hash for an aggregate record, or 'None'.
     */
    get hash(): string {
        return this.combined_hash ?? this.params_hash;
    }

    /** Fingerprint of the record's own parameter set, or 'None'. */
    get params_hash(): string {
        return this.params ? parameterSet_hash(this.params, this.context.hashOptions_get()) : 'None';
    }

    /** Registry dump of the parameter set; empty for a record without one. */
    params_dump(): ParamsDump {
        return this.params ? hashRepresentations_stringify(this.params, this.context.hashOptions_get()) : {};
    }

    /** Key this record contributes to an aggregate's combined hash. */
    get contribution_key(): string {
        return this.hash;
    }

    /** Whether the parameter set asks for every cache entry to be ignored. */
    get overwrite(): boolean {
        return this.params !== null && this.params.overwrite;
    }

    /**
     * Branch the record: the new record shares the current state cells
     * and may carry a different parameter set.
     */
    make_copy(params: Parameters | null = this.params): RunRecord {
        return this.context.record_branch(this, params);
    }

    // ─── Stage-Scoped Paths ─────────────────────────────────────

    /**
     * Cache path for an extra file written by the active stage, following
     * the artifact naming scheme. Tracked for store-full unless
     * `track: false`.
     */
    path_get(name: string, options: RecordPathOptions = {}): string {
        const target: string = this.scopedPath_resolve(name, options);
        if (options.track !== false) this.context.gateway.path_track(target);
        return target;
    }

    /**
     * Like `path_get`, for a directory; the directory is created unless
     * the run is dry. Store-full copies a tracked directory whole.
     */
    dir_get(name: string, options: RecordPathOptions = {}): string {
        const target: string = this.scopedPath_resolve(name, options);
        if (!this.context.settings.dry) this.context.gateway.backend.dir_create(target);
        if (options.track !== false) this.context.gateway.path_track(target);
        return target;
    }

    private scopedPath_resolve(name: string, options: RecordPathOptions): string {
        const last: StageIdentity | undefined = this.stage_log[this.stage_log.length - 1];
        const stage: string = this.stage_active ?? last?.stage ?? 'none';
        const key: CacheKey = { prefix: this.context.prefix_get(), hash: this.hash, stage, artifact: name };
        const cacherOptions: CacherOptions = { subdir: options.subdir, prefix: options.prefix };
        return this.context.gateway.keyPath_resolve(key, cacherOptions, options.extension ?? '');
    }
}
