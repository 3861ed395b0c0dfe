/**
 * @file DAG Engine Errors
 *
 * Error taxonomy for the planner and stage wrappers. Every error carries
 * a machine-readable code and a context record (stage, record, path) so
 * callers can branch on the failure class without parsing messages.
 *
 * Stage body exceptions are never wrapped in any of these; they propagate
 * exactly as thrown.
 *
 * @module dag/errors
 */

export type ErrorCode =
    // Configuration (fatal at definition or first invocation)
    | 'CONFIGURATION'
    | 'OUTPUT_SIGNATURE'
    | 'INPUT_SIGNATURE'
    | 'CACHERS_MISMATCH'
    | 'EMPTY_CACHERS'
    | 'UNDECLARED_INPUTS'
    // Record-level
    | 'MISSING_INPUT'
    // Cache and registries
    | 'CACHE_INTEGRITY'
    | 'LOCK_HELD';

export type ErrorContext = Record<string, string | number | boolean | null>;

/**
 * Base class for every error raised by the engine itself.
 */
export class CairnError extends Error {
    readonly code: ErrorCode;
    readonly context: ErrorContext;

    constructor(code: ErrorCode, message: string, context: ErrorContext = {}) {
        super(message);
        this.name = new.target.name;
        this.code = code;
        this.context = context;
    }
}

export class ConfigurationError extends CairnError {
    constructor(message: string, context: ErrorContext = {}) {
        super('CONFIGURATION', message, context);
    }
}

/** Returned value count does not match the declared outputs, or a lazy output has no cacher. */
export class OutputSignatureError extends CairnError {
    constructor(message: string, context: ErrorContext = {}) {
        super('OUTPUT_SIGNATURE', message, context);
    }
}

/** Malformed inputs/outputs declaration (duplicates, empty names). */
export class InputSignatureError extends CairnError {
    constructor(message: string, context: ErrorContext = {}) {
        super('INPUT_SIGNATURE', message, context);
    }
}

/** Cachers assigned to only some of a stage's outputs. */
export class CachersMismatchError extends CairnError {
    constructor(message: string, context: ErrorContext = {}) {
        super('CACHERS_MISMATCH', message, context);
    }
}

/** `cachers: []` would always short-circuit, so it is rejected outright. */
export class EmptyCachersError extends CairnError {
    constructor(message: string, context: ErrorContext = {}) {
        super('EMPTY_CACHERS', message, context);
    }
}

export class UndeclaredInputsError extends CairnError {
    constructor(message: string, context: ErrorContext = {}) {
        super('UNDECLARED_INPUTS', message, context);
    }
}

export class MissingInputError extends CairnError {
    constructor(message: string, context: ErrorContext = {}) {
        super('MISSING_INPUT', message, context);
    }
}

/** A cache entry reported present could not be read back. */
export class CacheIntegrityError extends CairnError {
    constructor(message: string, context: ErrorContext = {}) {
        super('CACHE_INTEGRITY', message, context);
    }
}

/** A registry lock could not be taken before the timeout. */
export class LockHeldError extends CairnError {
    constructor(message: string, context: ErrorContext = {}) {
        super('LOCK_HELD', message, context);
    }
}

/**
 * Render an unknown thrown value as a message string.
 */
export function errorMessage_get(error: unknown): string {
    if (error instanceof Error) return error.message;
    return String(error);
}
