/**
 * @file Hash Representation Strategy Chain
 *
 * Reduces one field of a configuration to a hash representation by
 * trying strategies in priority order until one applies:
 *
 *   1. blacklisted bookkeeping field → skipped
 *   2. value absent (undefined/null) → skipped
 *   3. registered override → its string, or skipped when `null`
 *   4. nested configuration → recurse
 *   5. callable → its name (default text may not be reproducible)
 *   6. default deterministic string conversion
 *
 * @module dag/fingerprint
 */

import { Parameters, PARAMETERS_BLACKLIST, hashOverride_resolve } from './parameters.js';
import type { HashOverride } from './parameters.js';
import type { HashRepresentation, HashRepresentations, HashOptions } from './types.js';

/** A configuration that can be hashed field by field. */
export type ConfigObject = Parameters | { [field: string]: unknown };

interface FieldContext {
    config: ConfigObject;
    field: string;
    value: unknown;
    options: HashOptions;
    /** Configurations currently being collected, outermost first. */
    ancestors: Set<object>;
}

/**
 * A strategy either produces a representation or declines with `null`.
 */
interface RepresentationStrategy {
    id: string;
    apply: (ctx: FieldContext) => HashRepresentation | null;
}

// ─── Value Shape ────────────────────────────────────────────────

/** Plain object literal (prototype is Object.prototype or null). */
export function plainObject_is(value: unknown): value is { [field: string]: unknown } {
    if (typeof value !== 'object' || value === null) return false;
    const proto: unknown = Object.getPrototypeOf(value);
    return proto === Object.prototype || proto === null;
}

/** Nested configuration: another parameter set, or a plain object. */
export function config_isNested(value: unknown): value is ConfigObject {
    return value instanceof Parameters || plainObject_is(value);
}

/** Own enumerable fields of a configuration, in declaration order. */
export function config_fields(config: ConfigObject): Array<[string, unknown]> {
    const entries: Array<[string, unknown]> = Object.entries(config);
    return entries;
}

// ─── Default Conversion ─────────────────────────────────────────

function constructorName_get(value: object): string {
    const ctor: unknown = Reflect.get(value, 'constructor');
    if (typeof ctor === 'function' && ctor.name) return ctor.name;
    return 'Object';
}

function customToString_has(value: object): boolean {
    const fn: unknown = Reflect.get(value, 'toString');
    return typeof fn === 'function' && fn !== Object.prototype.toString;
}

/**
 * Deterministic text for a value, or `null` if it cannot be produced
 * (reference cycle). Object keys, map entries and set members are sorted
 * so insertion order never leaks into the result.
 */
export function value_stringify(value: unknown, seen: Set<object> = new Set()): string | null {
    switch (typeof value) {
        case 'string': return JSON.stringify(value);
        case 'number': return String(value);
        case 'boolean': return String(value);
        case 'bigint': return `${value}n`;
        case 'symbol': return value.toString();
        case 'undefined': return 'undefined';
        case 'function': return value.name || '<anonymous>';
    }
    if (value === null) return 'null';
    if (typeof value !== 'object') return String(value);

    if (value instanceof Date) {
        return Number.isNaN(value.getTime()) ? 'Date(Invalid)' : `Date(${value.toISOString()})`;
    }
    if (value instanceof RegExp) return String(value);

    if (seen.has(value)) return null;
    seen.add(value);
    try {
        if (Array.isArray(value)) {
            const parts: string[] = [];
            for (const item of value) {
                const text: string | null = value_stringify(item, seen);
                if (text === null) return null;
                parts.push(text);
            }
            return `[${parts.join(', ')}]`;
        }

        if (value instanceof Map) {
            const parts: string[] = [];
            for (const [k, v] of value) {
                const keyText: string | null = value_stringify(k, seen);
                const valueText: string | null = value_stringify(v, seen);
                if (keyText === null || valueText === null) return null;
                parts.push(`${keyText}: ${valueText}`);
            }
            return `Map{${parts.sort().join(', ')}}`;
        }

        if (value instanceof Set) {
            const parts: string[] = [];
            for (const item of value) {
                const text: string | null = value_stringify(item, seen);
                if (text === null) return null;
                parts.push(text);
            }
            return `Set{${parts.sort().join(', ')}}`;
        }

        if (!plainObject_is(value) && customToString_has(value)) {
            return String(value);
        }

        const parts: string[] = [];
        const entries: Array<[string, unknown]> = Object.entries(value);
        entries.sort(([a], [b]): number => (a < b ? -1 : a > b ? 1 : 0));
        for (const [k, v] of entries) {
            const text: string | null = value_stringify(v, seen);
            if (text === null) return null;
            parts.push(`${JSON.stringify(k)}: ${text}`);
        }
        const label: string = plainObject_is(value) ? '' : constructorName_get(value);
        return `${label}{${parts.join(', ')}}`;
    } finally {
        seen.delete(value);
    }
}

/**
 * Default conversion that always succeeds. Unserializable values fall
 * back to an identity-style label, which is not reproducible across
 * runs; an override should be registered for such fields.
 */
export function value_represent(value: unknown, field: string, options: HashOptions): string {
    const text: string | null = value_stringify(value);
    if (text !== null) return text;
    const label: string = typeof value === 'object' && value !== null ? constructorName_get(value) : typeof value;
    options.warn?.(
        `Field '${field}' could not be converted to a stable string; using '<${label} object>'. Register a hash override for it.`,
    );
    return `<${label} object>`;
}

// ─── Strategy Chain ─────────────────────────────────────────────

const STRATEGIES: readonly RepresentationStrategy[] = [
    {
        id: 'blacklist',
        apply: (ctx: FieldContext): HashRepresentation | null =>
            PARAMETERS_BLACKLIST.includes(ctx.field) ? { strategy: 'skipped', reason: 'blacklist' } : null,
    },
    {
        id: 'absent',
        apply: (ctx: FieldContext): HashRepresentation | null =>
            ctx.value === undefined || ctx.value === null ? { strategy: 'skipped', reason: 'absent' } : null,
    },
    {
        id: 'override',
        apply: (ctx: FieldContext): HashRepresentation | null => {
            if (!(ctx.config instanceof Parameters)) return null;
            const override: HashOverride | undefined = hashOverride_resolve(ctx.config, ctx.field);
            if (override === undefined) return null;
            if (override === null) return { strategy: 'skipped', reason: 'ignored' };
            return { strategy: 'override', representation: String(override(ctx.config, ctx.value)) };
        },
    },
    {
        id: 'nested',
        apply: (ctx: FieldContext): HashRepresentation | null =>
            config_isNested(ctx.value) && !ctx.ancestors.has(ctx.value)
                ? { strategy: 'nested', representation: hashValues_collect(ctx.value, ctx.options, ctx.ancestors) }
                : null,
    },
    {
        id: 'callable',
        apply: (ctx: FieldContext): HashRepresentation | null =>
            typeof ctx.value === 'function'
                ? { strategy: 'callable', representation: ctx.value.name || '<anonymous>' }
                : null,
    },
    {
        id: 'default',
        apply: (ctx: FieldContext): HashRepresentation => ({
            strategy: 'default',
            representation: value_represent(ctx.value, ctx.field, ctx.options),
        }),
    },
];

/**
 * Run the strategy chain for one field. A nested configuration that is
 * already among `ancestors` is not recursed into; it falls through to
 * the default conversion, which reports the cycle.
 */
export function hashValue_represent(
    config: ConfigObject,
    field: string,
    value: unknown,
    options: HashOptions = {},
    ancestors: Set<object> = new Set([config]),
): HashRepresentation {
    const ctx: FieldContext = { config, field, value, options, ancestors };
    for (const strategy of STRATEGIES) {
        const result: HashRepresentation | null = strategy.apply(ctx);
        if (result) return result;
    }
    // 'default' always applies
    return { strategy: 'default', representation: value_represent(value, field, options) };
}

/**
 * Representations for every field of a configuration.
 */
export function hashValues_collect(
    config: ConfigObject,
    options: HashOptions = {},
    ancestors: Set<object> = new Set(),
): HashRepresentations {
    const result: HashRepresentations = {};
    ancestors.add(config);
    try {
        for (const [field, value] of config_fields(config)) {
            result[field] = hashValue_represent(config, field, value, options, ancestors);
        }
    } finally {
        ancestors.delete(config);
    }
    return result;
}
