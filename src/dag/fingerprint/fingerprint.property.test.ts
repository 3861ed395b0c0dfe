/**
 * @file Fingerprint Property Tests
 *
 * Invariants under test:
 *   1. Field order never affects the fingerprint.
 *   2. Changing any hashed value changes the fingerprint.
 *   3. The name never affects the fingerprint.
 *   4. Contributor order never affects a combined hash.
 */

import { describe, it } from 'vitest';
import * as fc from 'fast-check';
import { Parameters } from './parameters.js';
import { combinedHash_compute, parameterSet_hash } from './hasher.js';

// ─── Fixture Builders ────────────────────────────────────────────────────────

type FieldEntries = Array<[string, number]>;

function set_build(entries: FieldEntries, name: string = 'UNNAMED'): Parameters {
    return Object.assign(Parameters.create({ name }), Object.fromEntries(entries));
}

// ─── Arbitraries ──────────────────────────────────────────────────────────────

/** Unique field names 'f0', 'f1', ... each with an integer value. */
const fieldEntries = fc.uniqueArray(
    fc.integer({ min: 0, max: 50 }),
    { minLength: 1, maxLength: 8 }
).chain(ids => fc.array(fc.integer(), { minLength: ids.length, maxLength: ids.length }).map(
    (values): FieldEntries => ids.map((id, i): [string, number] => [`f${id}`, values[i]])
));

const hexKeys = fc.array(fc.hexaString({ minLength: 1, maxLength: 12 }), { minLength: 1, maxLength: 6 });

// ─── Properties ──────────────────────────────────────────────────────────────

describe('fingerprint — property invariants', (): void => {
    it('field order never affects the fingerprint', (): void => {
        fc.assert(fc.property(fieldEntries, (entries): boolean => {
            const reversed: FieldEntries = [...entries].reverse();
            return parameterSet_hash(set_build(entries)) === parameterSet_hash(set_build(reversed));
        }));
    });

    it('changing one hashed value changes the fingerprint', (): void => {
        fc.assert(fc.property(fieldEntries, fc.nat(), (entries, pick): boolean => {
            const index: number = pick % entries.length;
            const changed: FieldEntries = entries.map(([field, value], i): [string, number] =>
                i === index ? [field, value + 1] : [field, value]);
            return parameterSet_hash(set_build(entries)) !== parameterSet_hash(set_build(changed));
        }));
    });

    it('the name never affects the fingerprint', (): void => {
        fc.assert(fc.property(fieldEntries, fc.string(), fc.string(), (entries, a, b): boolean =>
            parameterSet_hash(set_build(entries, a)) === parameterSet_hash(set_build(entries, b))));
    });

    it('contributor order never affects a combined hash', (): void => {
        fc.assert(fc.property(hexKeys, (keys): boolean => {
            const shuffled: string[] = [...keys].reverse();
            return combinedHash_compute('None', keys) === combinedHash_compute('None', shuffled);
        }));
    });
});
