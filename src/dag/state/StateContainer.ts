/**
 * @file State Container
 *
 * Per-record artifact storage. Each name maps to a two-state cell:
 * an eager value in memory, or a lazy handle onto a cache entry.
 * Resolution happens here, at the access layer:
 *
 *   - `resolve` on (default): reading a lazy cell loads it
 *   - `resolve` off: reading a lazy cell returns the handle
 *   - `retain_lazy` on (default): the cell stays lazy after a load, so
 *     the next read loads again instead of pinning the value in memory
 *   - `retain_lazy` off: the loaded value replaces the cell
 *
 * Writes always produce an eager cell.
 *
 * @module dag/state
 */

import type { LazyHandle } from './LazyHandle.js';

export type ArtifactCell =
    | { kind: 'eager'; value: unknown }
    | { kind: 'lazy'; handle: LazyHandle };

/** What a snapshot shows for one artifact; lazy cells are never loaded. */
export type SnapshotEntry =
    | { kind: 'eager'; value: unknown }
    | { kind: 'lazy'; path: string };

export interface StateContainerOptions {
    retain_lazy?: boolean;
}

export class StateContainer {
    /** Resolve lazy cells on read. */
    resolve: boolean = true;
    readonly retain_lazy: boolean;
    private readonly cells: Map<string, ArtifactCell> = new Map();

    constructor(options: StateContainerOptions = {}) {
        this.retain_lazy = options.retain_lazy ?? true;
    }

    has(name: string): boolean {
        return this.cells.has(name);
    }

    /**
     * Value of an artifact, loading it if its cell is lazy and resolution
     * is on. `undefined` if there is no such artifact.
     */
    get(name: string): unknown {
        const cell: ArtifactCell | undefined = this.cells.get(name);
        if (!cell) return undefined;
        if (cell.kind === 'eager') return cell.value;
        if (!this.resolve || !cell.handle.auto_resolve) return cell.handle;
        const value: unknown = cell.handle.load();
        if (!this.retain_lazy) {
            this.cells.set(name, { kind: 'eager', value });
        }
        return value;
    }

    set(name: string, value: unknown): void {
        this.cells.set(name, { kind: 'eager', value });
    }

    lazy_set(name: string, handle: LazyHandle): void {
        this.cells.set(name, { kind: 'lazy', handle });
    }

    cell_get(name: string): ArtifactCell | undefined {
        return this.cells.get(name);
    }

    delete(name: string): boolean {
        return this.cells.delete(name);
    }

    keys(): string[] {
        return [...this.cells.keys()];
    }

    snapshot(): Record<string, SnapshotEntry> {
        const result: Record<string, SnapshotEntry> = {};
        for (const [name, cell] of this.cells) {
            result[name] = cell.kind === 'eager'
                ? { kind: 'eager', value: cell.value }
                : { kind: 'lazy', path: cell.handle.path };
        }
        return result;
    }

    /** Duplicate the cells. Values are shared, not cloned. */
    copy(): StateContainer {
        const clone: StateContainer = new StateContainer({ retain_lazy: this.retain_lazy });
        clone.resolve = this.resolve;
        for (const [name, cell] of this.cells) {
            clone.cells.set(name, cell);
        }
        return clone;
    }
}
