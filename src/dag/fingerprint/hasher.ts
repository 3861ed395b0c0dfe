/**
 * @file Fingerprint Hasher
 *
 * Computes parameter-set fingerprints. Each field's representation is
 * digested independently (prefixed with the field name, so two fields
 * swapping values do not collide), the digests are read as integers and
 * summed, and the sum is rendered as hex. Addition commutes, so field
 * order never affects the result.
 *
 * @module dag/fingerprint
 */

import { createHash } from 'crypto';
import type { Parameters } from './parameters.js';
import { PARAMETERS_BLACKLIST } from './parameters.js';
import {
    config_fields,
    config_isNested,
    hashValue_represent,
    hashValues_collect,
    value_stringify,
    type ConfigObject,
} from './representation.js';
import type {
    HashAlgorithm,
    HashOptions,
    HashRepresentation,
    HashRepresentations,
    ParamsDump,
} from './types.js';

/**
 * Digest a string and read it as an unsigned integer.
 */
export function digest_toBigInt(text: string, algorithm: HashAlgorithm = 'md5'): bigint {
    const hex: string = createHash(algorithm).update(text).digest('hex');
    return BigInt(`0x${hex}`);
}

/**
 * Sum the field digests of a representation tree. Nested configurations
 * contribute their own composite hex string as their representation.
 */
export function representations_sum(reps: HashRepresentations, algorithm: HashAlgorithm = 'md5'): bigint {
    let total: bigint = 0n;
    for (const [field, rep] of Object.entries(reps)) {
        const text: string | null = representation_text(rep, algorithm);
        if (text === null) continue;
        total += digest_toBigInt(`${field}${text}`, algorithm);
    }
    return total;
}

function representation_text(rep: HashRepresentation, algorithm: HashAlgorithm): string | null {
    switch (rep.strategy) {
        case 'skipped': return null;
        case 'nested': return representations_sum(rep.representation, algorithm).toString(16);
        default: return rep.representation;
    }
}

/**
 * Order-independent hash of a representation tree.
 */
export function hash_compute(reps: HashRepresentations, algorithm: HashAlgorithm = 'md5'): string {
    return representations_sum(reps, algorithm).toString(16);
}

/**
 * Fingerprint of a parameter set. Computed once and memoized on
 * `set.hash`; a hash already present is returned as-is.
 */
export function parameterSet_hash(set: Parameters, options: HashOptions = {}): string {
    if (set.hash !== null) return set.hash;
    const reps: HashRepresentations = hashValues_collect(set, options);
    set.hash = hash_compute(reps, options.algorithm ?? 'md5');
    return set.hash;
}

/**
 * Dry run: the strategy and representation used for every field, without
 * digesting or memoizing anything.
 */
export function parameterSet_hashDry(set: ConfigObject, options: HashOptions = {}): HashRepresentations {
    return hashValues_collect(set, options);
}

/**
 * Combined hash for a record that is not tied to one parameter set
 * (an aggregate). The active record's key and every contributing key are
 * digested and summed, so contributor order does not matter.
 *
 * @param activeKey - Hash key of the aggregate's own record ('None' if it has no set)
 * @param contributingKeys - Hash keys of the records being aggregated
 */
export function combinedHash_compute(
    activeKey: string,
    contributingKeys: string[],
    algorithm: HashAlgorithm = 'md5',
): string {
    let total: bigint = digest_toBigInt(`active:${activeKey}`, algorithm);
    for (const key of contributingKeys) {
        total += digest_toBigInt(key, algorithm);
    }
    return total.toString(16);
}

/**
 * JSON-safe dump of a configuration's representations for the params
 * registry and artifact metadata. Skipped (non-blacklisted) fields are
 * listed under `IGNORED_PARAMS` with their plain values.
 */
export function hashRepresentations_stringify(
    config: ConfigObject,
    options: HashOptions = {},
    ancestors: Set<object> = new Set(),
): ParamsDump {
    const dump: ParamsDump = {};
    const ignored: ParamsDump = {};

    ancestors.add(config);
    for (const [field, value] of config_fields(config)) {
        if (field === 'name') {
            dump[field] = typeof value === 'string' ? value : null;
            continue;
        }
        if (PARAMETERS_BLACKLIST.includes(field)) continue;

        const rep: HashRepresentation = hashValue_represent(config, field, value, options, ancestors);
        if (rep.strategy === 'nested') {
            dump[field] = config_isNested(value) ? hashRepresentations_stringify(value, options, ancestors) : null;
        } else if (rep.strategy !== 'skipped') {
            dump[field] = rep.representation;
        } else if (config_isNested(value) && !ancestors.has(value)) {
            ignored[field] = hashRepresentations_stringify(value, options, ancestors);
        } else if (value === undefined || value === null) {
            ignored[field] = null;
        } else {
            ignored[field] = value_stringify(value);
        }
    }
    ancestors.delete(config);

    if (Object.keys(ignored).length > 0) {
        dump['IGNORED_PARAMS'] = ignored;
    }
    return dump;
}
