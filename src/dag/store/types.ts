/**
 * @file Cache Store Type Definitions
 *
 * Types for the persistence layer under the planner. Artifacts are
 * addressed by a cache key (prefix, hash, stage, artifact) and written
 * through a pluggable serialization strategy (a cacher) onto a storage
 * backend. The gateway never touches I/O directly: the same code runs
 * against the real filesystem or an in-memory tree.
 *
 * All I/O here is synchronous. There are no suspension points in the
 * planner, so a stage's cache check, load and save complete in order.
 *
 * @module dag/store
 */

import type { ParamsDump } from '../fingerprint/types.js';

// ─── Storage Backend Interface ──────────────────────────────────

/**
 * Backend-agnostic storage interface.
 *
 * Methods are named subject_verb.
 */
export interface StorageBackend {
    /** Write data to a path. Creates parent directories as needed. */
    artifact_write(path: string, data: string | Buffer): void;

    /**
     * Create a file only if nothing exists at `path`.
     *
     * @returns false if the path already existed.
     */
    artifact_create(path: string, data: string): boolean;

    /** Read data from a path. Returns null if the path is not a file. */
    artifact_read(path: string): Buffer | null;

    /** Remove a file. No-op if it does not exist. */
    artifact_remove(path: string): void;

    /** Copy a file, creating the target's parent directories. */
    artifact_copy(source: string, target: string): void;

    /** Check whether a path exists. */
    path_exists(path: string): boolean;

    /** List immediate children of a directory. Returns names, not full paths. */
    children_list(path: string): string[];

    /** Create a directory (and parents). No-op if already exists. */
    dir_create(path: string): void;
}

// ─── Cache Key ──────────────────────────────────────────────────

/**
 * Address of one artifact in the managed cache tree.
 *
 * @property prefix - Normally the experiment name (or a custom prefix)
 * @property hash - Parameter-set fingerprint, or a combined hash for aggregates
 * @property stage - Name of the producing stage
 * @property artifact - Name of the output artifact
 */
export interface CacheKey {
    prefix: string;
    hash: string;
    stage: string;
    artifact: string;
}

// ─── Cacher Options ─────────────────────────────────────────────

/**
 * Per-output options shared by every cacher.
 *
 * @property path_override - Fixed path; disables key addressing and store-full tracking
 * @property subdir - Subdirectory of the cache root to write under
 * @property prefix - Replaces the key's prefix in the file name
 * @property track - Include in store-full copies (default true)
 */
export interface CacherOptions {
    path_override?: string;
    subdir?: string;
    prefix?: string;
    track?: boolean;
}

// ─── Metadata ───────────────────────────────────────────────────

/**
 * Side record written next to every cached artifact.
 *
 * @property artifact_name - Output name the payload was saved under
 * @property stage - Producing stage
 * @property record_name - Name of the record's parameter set ('None' for none)
 * @property params_hash - Hash the entry is keyed by
 * @property params - Registry dump of the parameter set
 * @property stage_chain - Stages the record had passed through when this was saved
 * @property run_reference - Reference of the run that wrote the entry
 * @property cacher - Kind of cacher that wrote the payload
 * @property timestamp - ISO timestamp of the write
 */
export interface ArtifactMetadata {
    artifact_name: string;
    stage: string;
    record_name: string;
    params_hash: string;
    params: ParamsDump;
    stage_chain: string[];
    run_reference: string;
    cacher: string;
    timestamp: string;
}

// ─── Registries ─────────────────────────────────────────────────

export type RunStatus = 'incomplete' | 'complete' | 'failed';

/**
 * One run in the run registry (`store.json`).
 *
 * @property reference - `<experiment>_<run number>_<timestamp>`
 * @property run_number - Monotonic across the registry
 * @property param_names - Names of the parameter sets the run was given
 * @property hashes - Their fingerprints, in the same order
 * @property store_full - Whether a full run folder was written
 */
export interface RunEntry {
    reference: string;
    experiment_name: string;
    run_number: number;
    timestamp: string;
    status: RunStatus;
    param_names: string[];
    hashes: string[];
    store_full: boolean;
}

/**
 * One entry in the params registry: either a parameter set's dump, or
 * the contributing keys behind a combined hash.
 */
export type ParamsRegistryEntry =
    | { kind: 'params'; hash: string; params: ParamsDump }
    | { kind: 'combined'; hash: string; contributing: string[] };
