/**
 * @file Registries
 *
 * Process-shared bookkeeping kept outside the per-key cache: the run
 * registry (`store.json`: run numbers and references) and the params
 * registry (`params_registry.json`: what each hash stands for).
 *
 * Both are explicit store objects injected through the run context.
 * Every read-modify-write happens under the registry's lockfile so that
 * processes running slices of the same experiment do not lose updates.
 *
 * @module dag/store
 */

import path from 'path';
import { z } from 'zod';
import { CacheIntegrityError, errorMessage_get } from '../errors.js';
import { lock_with, type LockOptions } from './lock.js';
import { ParamsRegistryEntrySchema, RunEntrySchema } from './schemas.js';
import type { ParamsDump } from '../fingerprint/types.js';
import type { ParamsRegistryEntry, RunEntry, RunStatus, StorageBackend } from './types.js';

// ─── Generic Store ──────────────────────────────────────────────

/**
 * A JSON list of entries on a storage backend, validated on every read.
 */
export class RegistryStore<E> {
    private readonly listSchema: z.ZodType<E[]>;

    constructor(
        private readonly backend: StorageBackend,
        readonly filePath: string,
        schema: z.ZodType<E>,
        private readonly lockOptions: LockOptions = {},
    ) {
        this.listSchema = z.array(schema);
    }

    /** All entries. A registry that was never written is empty. */
    get(): E[] {
        const data: Buffer | null = this.backend.artifact_read(this.filePath);
        if (data === null) return [];
        let raw: unknown;
        try {
            raw = JSON.parse(data.toString('utf-8'));
        } catch (error: unknown) {
            throw new CacheIntegrityError(`Registry '${this.filePath}' is not valid JSON: ${errorMessage_get(error)}`, {
                path: this.filePath,
            });
        }
        const parsed = this.listSchema.safeParse(raw);
        if (!parsed.success) {
            throw new CacheIntegrityError(`Registry '${this.filePath}' is malformed: ${parsed.error.message}`, {
                path: this.filePath,
            });
        }
        return parsed.data;
    }

    append(entry: E): void {
        this.transact((entries: E[]): E[] => [...entries, entry]);
    }

    /**
     * Replace every entry matching `predicate` with `patch(entry)`.
     *
     * @returns Number of entries updated.
     */
    update(predicate: (entry: E) => boolean, patch: (entry: E) => E): number {
        let count: number = 0;
        this.transact((entries: E[]): E[] =>
            entries.map((entry: E): E => {
                if (!predicate(entry)) return entry;
                count++;
                return patch(entry);
            }),
        );
        return count;
    }

    /**
     * Read, transform and persist under the lock. `mutate` runs while
     * the lock is held, so it must not take the same lock again.
     */
    transact(mutate: (entries: E[]) => E[]): E[] {
        return lock_with(
            this.backend,
            this.filePath,
            (): E[] => {
                const next: E[] = mutate(this.get());
                this.backend.artifact_write(this.filePath, JSON.stringify(next, null, 2));
                return next;
            },
            this.lockOptions,
        );
    }
}

// ─── Run Registry ───────────────────────────────────────────────

/**
 * `YYYY-MM-DD-THHMMSS` in local time, as used in run references.
 */
export function timestamp_format(date: Date): string {
    const pad = (n: number): string => String(n).padStart(2, '0');
    return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`
        + `-T${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

export interface RunStartInput {
    experiment_name: string;
    param_names: string[];
    hashes: string[];
    store_full: boolean;
}

export class RunRegistry {
    readonly store: RegistryStore<RunEntry>;

    constructor(backend: StorageBackend, managerPath: string, lockOptions: LockOptions = {}) {
        this.store = new RegistryStore(backend, path.join(managerPath, 'store.json'), RunEntrySchema, lockOptions);
    }

    /**
     * Register a new run. The run number is taken and persisted in one
     * locked step, so two processes never receive the same number.
     */
    run_start(input: RunStartInput, now: Date = new Date()): RunEntry {
        const timestamp: string = timestamp_format(now);
        const entry_make = (run_number: number): RunEntry => ({
            reference: `${input.experiment_name}_${run_number}_${timestamp}`,
            experiment_name: input.experiment_name,
            run_number,
            timestamp,
            status: 'incomplete',
            param_names: input.param_names,
            hashes: input.hashes,
            store_full: input.store_full,
        });
        const entries: RunEntry[] = this.store.transact((existing: RunEntry[]): RunEntry[] => {
            const last: number = existing.reduce(
                (max: number, entry: RunEntry): number => Math.max(max, entry.run_number), 0,
            );
            return [...existing, entry_make(last + 1)];
        });
        return entries[entries.length - 1];
    }

    run_finish(reference: string, status: RunStatus): void {
        this.store.update(
            (entry: RunEntry): boolean => entry.reference === reference,
            (entry: RunEntry): RunEntry => ({ ...entry, status }),
        );
    }

    runs_list(): RunEntry[] {
        return this.store.get();
    }
}

// ─── Params Registry ────────────────────────────────────────────

export class ParamsRegistry {
    readonly store: RegistryStore<ParamsRegistryEntry>;

    constructor(backend: StorageBackend, managerPath: string, lockOptions: LockOptions = {}) {
        this.store = new RegistryStore(
            backend,
            path.join(managerPath, 'params_registry.json'),
            ParamsRegistryEntrySchema,
            lockOptions,
        );
    }

    /** Record what `hash` stands for. A hash already present is left alone. */
    params_register(hash: string, params: ParamsDump): void {
        this.entry_register({ kind: 'params', hash, params });
    }

    /** Record the contributing keys behind an aggregate's combined hash. */
    combined_register(hash: string, contributing: string[]): void {
        this.entry_register({ kind: 'combined', hash, contributing: [...contributing].sort() });
    }

    entry_get(hash: string): ParamsRegistryEntry | null {
        return this.store.get().find((entry: ParamsRegistryEntry): boolean => entry.hash === hash) ?? null;
    }

    private entry_register(entry: ParamsRegistryEntry): void {
        this.store.transact((entries: ParamsRegistryEntry[]): ParamsRegistryEntry[] =>
            entries.some((existing: ParamsRegistryEntry): boolean => existing.hash === entry.hash)
                ? entries
                : [...entries, entry],
        );
    }
}
