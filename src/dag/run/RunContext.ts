/**
 * @file Run Context
 *
 * Everything a stage call needs to know about the run it belongs to:
 * settings, the cache gateway, logging and provenance, the registries,
 * and the per-phase bookkeeping (mode, records, invocation counter,
 * graph builder, plan, failures).
 *
 * The planner resets the per-phase state before each pass over the
 * driver, so record ids and stage identities are assigned identically in
 * the mapping and execution phases.
 *
 * @module dag/run
 */

import { ConfigurationError } from '../errors.js';
import type { Parameters } from '../fingerprint/parameters.js';
import type { HashOptions } from '../fingerprint/types.js';
import { GraphBuilder } from '../graph/ExecutionGraph.js';
import type { ExecutionPlan, StageIdentity } from '../graph/types.js';
import { RunRecord } from '../record/RunRecord.js';
import type { StageInvocation } from '../stage/types.js';
import { FsBackend } from '../store/backend/fs.js';
import { CacheGateway } from '../store/CacheGateway.js';
import { ParamsRegistry, RunRegistry } from '../store/registry.js';
import type { StorageBackend } from '../store/types.js';
import { RunSettingsSchema } from '../../config/settings.js';
import type { RunSettings, RunSettingsInput } from '../../config/settings.js';
import { consoleSink_attach, Logger } from '../../logging/Logger.js';
import { MemoryProvenance } from './provenance.js';
import type { ProvenanceSink } from './provenance.js';

/**
 * - map: stage bodies disabled, calls become graph nodes
 * - execute: bodies run, gated by the plan's must-execute set
 * - sequential: bodies run for every call, no plan
 */
export type RunMode = 'map' | 'execute' | 'sequential';

/**
 * A stage failure isolated under `continue_on_error`.
 */
export interface RunFailure {
    identity: StageIdentity;
    record_id: number;
    record_name: string;
    error: unknown;
}

/**
 * @property settings - Raw settings; defaults are applied here
 * @property backend - Storage for cache and registries (default: the filesystem)
 * @property logger - Without one, a logger with a console sink at `log_level` is created
 * @property provenance - Default: in-memory
 */
export interface RunContextOptions {
    settings?: RunSettingsInput;
    backend?: StorageBackend;
    logger?: Logger;
    provenance?: ProvenanceSink;
}

export class RunContext {
    readonly settings: RunSettings;
    readonly backend: StorageBackend;
    readonly gateway: CacheGateway;
    readonly logger: Logger;
    readonly provenance: ProvenanceSink;
    /** Null in dry mode. */
    readonly runs: RunRegistry | null;
    /** Null in dry mode. */
    readonly params_registry: ParamsRegistry | null;

    mode: RunMode = 'sequential';
    plan: ExecutionPlan | null = null;
    graph: GraphBuilder = new GraphBuilder();
    records: RunRecord[] = [];
    invocations: StageInvocation[] = [];
    failures: RunFailure[] = [];
    /** Name of the stage whose body is running, for nested-call detection. */
    stage_active: string | null = null;
    /** Node key of that stage's call. */
    node_active: string | null = null;

    private counter: number = 0;
    private readonly nested: Map<string, number> = new Map();
    private reference: string | null = null;
    private readonly warned: Set<string> = new Set();

    constructor(options: RunContextOptions = {}) {
        const parsed = RunSettingsSchema.safeParse(options.settings ?? {});
        if (!parsed.success) {
            throw new ConfigurationError(`Invalid run settings: ${parsed.error.message}`);
        }
        this.settings = parsed.data;
        this.backend = options.backend ?? new FsBackend();
        this.gateway = new CacheGateway({
            backend: this.backend,
            cache_path: this.settings.cache_path,
            dry: this.settings.dry,
            dry_cache: this.settings.dry_cache,
        });
        if (options.logger) {
            this.logger = options.logger;
        } else {
            this.logger = new Logger();
            consoleSink_attach(this.logger, this.settings.log_level);
        }
        this.provenance = options.provenance ?? new MemoryProvenance();
        this.runs = this.settings.dry ? null : new RunRegistry(this.backend, this.settings.manager_cache_path);
        this.params_registry = this.settings.dry
            ? null
            : new ParamsRegistry(this.backend, this.settings.manager_cache_path);
    }

    // ─── Records ────────────────────────────────────────────────

    /** New record with an empty state. Ids follow creation order within a phase. */
    record_create(params: Parameters | null = null): RunRecord {
        const record: RunRecord = new RunRecord(this, this.records.length, params);
        this.records.push(record);
        return record;
    }

    /** New record sharing a copy of `source`'s state cells and stage log. */
    record_branch(source: RunRecord, params: Parameters | null): RunRecord {
        const record: RunRecord = new RunRecord(this, this.records.length, params, source.state.copy());
        record.stage_log.push(...source.stage_log);
        this.records.push(record);
        this.graph.record_branch(source.id, record.id);
        return record;
    }

    // ─── Phase Bookkeeping ──────────────────────────────────────

    /**
     * Next identity in the run's call sequence. A call made while another
     * stage's body runs is numbered under that call instead, so the
     * sequence the mapping phase saw stays intact.
     */
    identity_next(stage: string): StageIdentity {
        if (this.node_active !== null) {
            const parent: string = this.node_active;
            const index: number = this.nested.get(parent) ?? 0;
            this.nested.set(parent, index + 1);
            return { stage, index, parent };
        }
        const identity: StageIdentity = { stage, index: this.counter };
        this.counter += 1;
        return identity;
    }

    /**
     * Start a pass over the driver. A mapping pass gets a fresh graph;
     * every pass gets fresh records, counter and failure list.
     */
    phase_reset(mode: RunMode, plan: ExecutionPlan | null = null): void {
        this.mode = mode;
        this.plan = plan;
        this.counter = 0;
        this.records = [];
        this.invocations = [];
        this.failures = [];
        this.stage_active = null;
        this.node_active = null;
        this.nested.clear();
        if (mode === 'map') this.graph = new GraphBuilder();
    }

    failure_add(failure: RunFailure): void {
        this.failures.push(failure);
    }

    // ─── Lookups ────────────────────────────────────────────────

    /** Prefix used in cache file names. */
    prefix_get(): string {
        return this.settings.custom_prefix ?? this.settings.experiment_name;
    }

    hashOptions_get(): HashOptions {
        return {
            algorithm: this.settings.hash_algorithm,
            warn: (message: string): void => this.warning_emitOnce(message),
        };
    }

    /** Whether the settings or the record's parameter set ask to bypass `stage`'s cache. */
    overwrite_requested(stage: string, record: RunRecord): boolean {
        return this.settings.overwrite || this.settings.overwrite_stages.includes(stage) || record.overwrite;
    }

    /** `<experiment>_<run number>_<timestamp>` once registered. */
    reference_get(): string {
        return this.reference ?? `${this.settings.experiment_name}_unregistered`;
    }

    reference_set(reference: string): void {
        this.reference = reference;
    }

    /** Record the contributors behind a combined hash (no-op in dry mode). */
    combined_register(hash: string, contributing: string[]): void {
        this.params_registry?.combined_register(hash, contributing);
    }

    /** Log a warning the first time `message` is seen in this context. */
    warning_emitOnce(message: string): void {
        if (this.warned.has(message)) return;
        this.warned.add(message);
        this.logger.warn(message);
    }
}
