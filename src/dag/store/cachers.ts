/**
 * @file Cachers
 *
 * Serialization strategies for stage outputs. A cacher owns its file
 * extension and its encode/decode pair; the gateway decides where the
 * file goes. `load` never falls back to a default: a missing or
 * undecodable payload raises `CacheIntegrityError`.
 *
 * | cacher           | value                        | format         |
 * |------------------|------------------------------|----------------|
 * | JsonCacher       | JSON-compatible value        | .json          |
 * | YamlCacher       | YAML-compatible value        | .yaml          |
 * | TableCacher      | array of uniform row objects | .csv           |
 * | RawCacher        | Buffer or string             | .bin           |
 * | SerializedCacher | structured-clone value       | .v8            |
 * | ReferenceCacher  | path or list of paths        | .json          |
 *
 * @module dag/store
 */

import v8 from 'v8';
import yaml from 'js-yaml';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { CacheIntegrityError, ConfigurationError, errorMessage_get } from '../errors.js';
import type { CacherOptions, StorageBackend } from './types.js';

export type CacherKind = 'json' | 'yaml' | 'table' | 'raw' | 'serialized' | 'reference';

/** One row of a table artifact. */
export type TableRow = Record<string, string | number | boolean>;

// ─── Base ───────────────────────────────────────────────────────

export abstract class Cacher {
    abstract readonly kind: CacherKind;
    abstract readonly extension: string;
    readonly options: CacherOptions;

    constructor(options: CacherOptions = {}) {
        this.options = options;
    }

    /** Whether entries written by this cacher are copied by store-full. */
    get tracked(): boolean {
        return this.options.path_override === undefined && this.options.track !== false;
    }

    protected abstract encode(value: unknown): string | Buffer;
    protected abstract decode(data: Buffer): unknown;

    /**
     * Serialize `value` to `path`.
     *
     * @returns The path actually written.
     */
    save(backend: StorageBackend, path: string, value: unknown): string {
        backend.artifact_write(path, this.encode(value));
        return path;
    }

    load(backend: StorageBackend, path: string): unknown {
        const data: Buffer | null = backend.artifact_read(path);
        if (data === null) {
            throw new CacheIntegrityError(`Cache entry '${path}' is missing`, { path, cacher: this.kind });
        }
        try {
            return this.decode(data);
        } catch (error: unknown) {
            throw new CacheIntegrityError(
                `Cache entry '${path}' could not be decoded by the ${this.kind} cacher: ${errorMessage_get(error)}`,
                { path, cacher: this.kind },
            );
        }
    }

    /** Existence only; the payload is never read. */
    exists(backend: StorageBackend, path: string): boolean {
        return backend.path_exists(path);
    }
}

// ─── Text Formats ───────────────────────────────────────────────

export class JsonCacher extends Cacher {
    readonly kind = 'json' as const;
    readonly extension: string = '.json';

    protected encode(value: unknown): string {
        const text: string | undefined = JSON.stringify(value, null, 2);
        if (text === undefined) {
            throw new ConfigurationError('JsonCacher cannot encode an undefined value or a function', { cacher: this.kind });
        }
        return text;
    }

    protected decode(data: Buffer): unknown {
        return JSON.parse(data.toString('utf-8'));
    }
}

export class YamlCacher extends Cacher {
    readonly kind = 'yaml' as const;
    readonly extension: string = '.yaml';

    protected encode(value: unknown): string {
        return yaml.dump(value, { sortKeys: false, noRefs: true });
    }

    protected decode(data: Buffer): unknown {
        return yaml.load(data.toString('utf-8'));
    }
}

/**
 * Rows of records as CSV. Each header cell is `<column>:<type>`, so cells
 * load back as the type they were saved with. Every row must carry the
 * same columns, and a column holds one type of finite number, string or
 * boolean; anything else is refused on save.
 */
export class TableCacher extends Cacher {
    readonly kind = 'table' as const;
    readonly extension: string = '.csv';

    protected encode(value: unknown): string {
        if (!tableRows_is(value)) {
            throw new ConfigurationError(
                'TableCacher expects an array of flat row objects with string, finite number or boolean cells',
                { cacher: this.kind },
            );
        }
        const columns: TableColumn[] = tableColumns_infer(value);
        if (columns.length === 0) return '';
        const header: string[] = columns.map((column: TableColumn): string => `${column.name}:${column.type}`);
        const body: string[][] = value.map((row: TableRow): string[] =>
            columns.map((column: TableColumn): string => String(row[column.name])));
        return stringify([header, ...body], { quoted_empty: true });
    }

    protected decode(data: Buffer): TableRow[] {
        const records: unknown = parse(data.toString('utf-8'), { skip_empty_lines: true });
        if (!stringGrid_is(records)) {
            throw new Error('parsed CSV is not a list of records');
        }
        const [header, ...body] = records;
        if (header === undefined) return [];
        const columns: TableColumn[] = header.map(tableColumn_parse);
        return body.map((cells: string[]): TableRow => {
            const row: TableRow = {};
            columns.forEach((column: TableColumn, i: number): void => {
                row[column.name] = tableCell_decode(column, cells[i] ?? '');
            });
            return row;
        });
    }
}

type TableCellType = 'string' | 'number' | 'boolean';

interface TableColumn {
    name: string;
    type: TableCellType;
}

function tableCellType_is(value: string): value is TableCellType {
    return value === 'string' || value === 'number' || value === 'boolean';
}

function tableRows_is(value: unknown): value is TableRow[] {
    if (!Array.isArray(value)) return false;
    return value.every((row: unknown): boolean => {
        if (typeof row !== 'object' || row === null || Array.isArray(row)) return false;
        return Object.values(row).every((cell: unknown): boolean =>
            typeof cell === 'string'
            || typeof cell === 'boolean'
            || (typeof cell === 'number' && Number.isFinite(cell)));
    });
}

/**
 * Column names and types in first-seen order. Raises when rows disagree
 * on their columns or a column mixes types.
 */
function tableColumns_infer(rows: TableRow[]): TableColumn[] {
    const first: TableRow | undefined = rows[0];
    if (first === undefined) return [];
    const columns: TableColumn[] = Object.keys(first).map((name: string): TableColumn => {
        const type: string = typeof first[name];
        if (!tableCellType_is(type)) {
            throw new ConfigurationError(`Column '${name}' holds an unsupported value`, { cacher: 'table', column: name });
        }
        return { name, type };
    });
    rows.forEach((row: TableRow, index: number): void => {
        const names: string[] = Object.keys(row);
        if (names.length !== columns.length || columns.some((column: TableColumn): boolean => !(column.name in row))) {
            throw new ConfigurationError(
                `Row ${index} does not have the columns of the first row`,
                { cacher: 'table', row: index },
            );
        }
        for (const column of columns) {
            if (typeof row[column.name] !== column.type) {
                throw new ConfigurationError(
                    `Column '${column.name}' mixes ${column.type} with ${typeof row[column.name]} in row ${index}`,
                    { cacher: 'table', column: column.name, row: index },
                );
            }
        }
    });
    return columns;
}

function tableColumn_parse(cell: string): TableColumn {
    const split: number = cell.lastIndexOf(':');
    const type: string = split < 0 ? '' : cell.slice(split + 1);
    if (!tableCellType_is(type)) {
        throw new Error(`header cell '${cell}' does not name a column type`);
    }
    return { name: cell.slice(0, split), type };
}

function tableCell_decode(column: TableColumn, cell: string): string | number | boolean {
    switch (column.type) {
        case 'string':
            return cell;
        case 'boolean':
            if (cell !== 'true' && cell !== 'false') {
                throw new Error(`column '${column.name}' holds '${cell}', not a boolean`);
            }
            return cell === 'true';
        case 'number': {
            const parsed: number = cell.trim() === '' ? Number.NaN : Number(cell);
            if (!Number.isFinite(parsed)) {
                throw new Error(`column '${column.name}' holds '${cell}', not a number`);
            }
            return parsed;
        }
    }
}

function stringGrid_is(value: unknown): value is string[][] {
    return Array.isArray(value) && value.every((record: unknown): boolean =>
        Array.isArray(record) && record.every((cell: unknown): boolean => typeof cell === 'string'));
}

// ─── Binary Formats ─────────────────────────────────────────────

export class RawCacher extends Cacher {
    readonly kind = 'raw' as const;
    readonly extension: string;

    constructor(options: CacherOptions & { extension?: string } = {}) {
        super(options);
        this.extension = options.extension ?? '.bin';
    }

    protected encode(value: unknown): string | Buffer {
        if (typeof value === 'string' || Buffer.isBuffer(value)) return value;
        throw new ConfigurationError('RawCacher expects a Buffer or a string', { cacher: this.kind });
    }

    protected decode(data: Buffer): Buffer {
        return data;
    }
}

/**
 * Opaque structured-clone serialization (Maps, Sets, Dates, typed
 * arrays, nested objects). Class prototypes are not preserved.
 */
export class SerializedCacher extends Cacher {
    readonly kind = 'serialized' as const;
    readonly extension: string = '.v8';

    protected encode(value: unknown): Buffer {
        return v8.serialize(value);
    }

    protected decode(data: Buffer): unknown {
        return v8.deserialize(data);
    }
}

// ─── References ─────────────────────────────────────────────────

/**
 * Stores a pointer to files rather than their content. The entry only
 * counts as present if every referenced file still exists.
 */
export class ReferenceCacher extends Cacher {
    readonly kind = 'reference' as const;
    readonly extension: string = '.json';

    protected encode(value: unknown): string {
        if (!reference_is(value)) {
            throw new ConfigurationError('ReferenceCacher expects a path or a list of paths', { cacher: this.kind });
        }
        return JSON.stringify(value, null, 2);
    }

    protected decode(data: Buffer): string | string[] {
        const value: unknown = JSON.parse(data.toString('utf-8'));
        if (!reference_is(value)) {
            throw new Error('reference entry does not hold a path or a list of paths');
        }
        return value;
    }

    exists(backend: StorageBackend, path: string): boolean {
        if (!backend.path_exists(path)) return false;
        const reference: unknown = this.load(backend, path);
        const paths: string[] = reference_is(reference) ? [reference].flat() : [];
        return paths.every((target: string): boolean => backend.path_exists(target));
    }
}

function reference_is(value: unknown): value is string | string[] {
    if (typeof value === 'string') return true;
    return Array.isArray(value) && value.every((entry: unknown): boolean => typeof entry === 'string');
}
