/**
 * @file Parameter Sets
 *
 * Base class for experiment configurations. Subclasses declare their
 * fields with defaults; `create()` fills in per-instance values:
 *
 *     class TrainParams extends Parameters {
 *         seed: number = 1;
 *         lr: number = 0.01;
 *         gpus: number = 1;
 *         static hash_overrides: HashOverrides = { gpus: null };
 *     }
 *     const p1 = TrainParams.create({ name: 'P1', seed: 7 });
 *
 * Do not mutate a parameter set after its hash has been taken: `hash`
 * is memoized and will no longer match the fields.
 *
 * @module dag/fingerprint
 */

/**
 * Custom hash representation for one field. `null` excludes the field
 * from the fingerprint entirely.
 */
export type HashOverride = ((set: Parameters, value: unknown) => string) | null;

export type HashOverrides = Record<string, HashOverride>;

/** Fields that never contribute to the fingerprint. */
export const PARAMETERS_BLACKLIST: readonly string[] = ['name', 'hash', 'overwrite', 'hash_overrides'];

export class Parameters {
    /** Display name; distinguishes sets in logs and aggregates. */
    name: string = 'UNNAMED';
    /** Ignore cached artifacts for every stage run with this set. */
    overwrite: boolean = false;
    /** Memoized fingerprint. Filled on first hash; may be set by hand. */
    hash: string | null = null;
    /** Instance-level overrides. Shadow the class-level table per field. */
    hash_overrides: HashOverrides = {};

    /** Class-level overrides, redeclared by subclasses. */
    static hash_overrides: HashOverrides = {};

    /**
     * Construct a subclass instance and assign the given field values.
     */
    static create<T extends Parameters>(this: new () => T, init: Partial<T> = {}): T {
        return Object.assign(new this(), init);
    }
}

// ─── Override Lookup ────────────────────────────────────────────

function overrideTable_is(value: unknown): value is HashOverrides {
    if (typeof value !== 'object' || value === null) return false;
    return Object.values(value).every(
        (entry: unknown): boolean => entry === null || typeof entry === 'function',
    );
}

/**
 * Resolve the override registered for `field`, instance table first.
 *
 * @returns The override (possibly `null` = ignore), or `undefined` if none is registered.
 */
export function hashOverride_resolve(set: Parameters, field: string): HashOverride | undefined {
    if (Object.prototype.hasOwnProperty.call(set.hash_overrides, field)) {
        return set.hash_overrides[field];
    }
    const classTable: unknown = Reflect.get(set.constructor, 'hash_overrides');
    if (overrideTable_is(classTable) && Object.prototype.hasOwnProperty.call(classTable, field)) {
        return classTable[field];
    }
    return undefined;
}
