/**
 * @file Fingerprint Type Definitions
 *
 * Types for parameter-set fingerprinting. A fingerprint is the cache
 * namespace of a parameter set: every artifact a stage produces for that
 * set is stored under it, so two sets with the same semantic content
 * share cache entries regardless of their names or field order.
 *
 * Each field is reduced to a hash representation by an ordered strategy
 * chain; the representations are digested independently and the integer
 * digests summed, which is what makes the result order-independent.
 *
 * @module dag/fingerprint
 */

// ─── Digest ─────────────────────────────────────────────────────

/** Per-field digest. Width is tunable; md5 is the default. */
export type HashAlgorithm = 'md5' | 'sha1' | 'sha256';

// ─── Hash Representation ────────────────────────────────────────

/**
 * Why a field contributed nothing to the fingerprint.
 *
 * - blacklist: bookkeeping field (`name`, `hash`, `overwrite`, `hash_overrides`)
 * - absent: value is `undefined` or `null`
 * - ignored: an override of `null` is registered for the field
 */
export type SkipReason = 'blacklist' | 'absent' | 'ignored';

/**
 * Outcome of the strategy chain for one field. A closed union: the
 * hasher switches on `strategy` and never inspects the raw value again.
 */
export type HashRepresentation =
    | { strategy: 'skipped'; reason: SkipReason }
    | { strategy: 'override'; representation: string }
    | { strategy: 'nested'; representation: HashRepresentations }
    | { strategy: 'callable'; representation: string }
    | { strategy: 'default'; representation: string };

/** Field name → representation. This is the "dry" hash output. */
export type HashRepresentations = Record<string, HashRepresentation>;

// ─── Registry Dump ──────────────────────────────────────────────

/**
 * JSON-safe dump of a parameter set's hash representations, as written
 * to the params registry and to artifact metadata. Ignored fields are
 * collected under `IGNORED_PARAMS`.
 */
export interface ParamsDump {
    [field: string]: string | null | ParamsDump;
}

// ─── Options ────────────────────────────────────────────────────

/**
 * @property algorithm - Per-field digest (default md5)
 * @property warn - Receives fallback warnings (unserializable values)
 */
export interface HashOptions {
    algorithm?: HashAlgorithm;
    warn?: (message: string) => void;
}
