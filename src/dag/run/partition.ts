/**
 * @file Parameter-Set Partitioning
 *
 * Splits a list of parameter sets into contiguous slices, one per
 * process, for coarse-grained parallel runs. Each process runs both
 * phases over its own slice; a final single-process run over the full
 * list then finds everything in the cache.
 *
 * @module dag/run
 */

import { ConfigurationError } from '../errors.js';

/** Half-open index range `[start, end)`. */
export type IndexRange = [number, number];

/**
 * Ranges covering `0..count` in order. Slice sizes differ by at most
 * one, the larger slices first; no range is empty, so fewer than
 * `processes` ranges come back when there are fewer sets than processes.
 */
export function paramSets_partition(count: number, processes: number): IndexRange[] {
    if (!Number.isInteger(processes) || processes < 1) {
        throw new ConfigurationError(`Process count must be a positive integer, got ${processes}`, { processes });
    }
    if (!Number.isInteger(count) || count < 0) {
        throw new ConfigurationError(`Parameter-set count must be a non-negative integer, got ${count}`, { count });
    }

    const slices: number = Math.min(count, processes);
    const base: number = Math.floor(count / Math.max(slices, 1));
    const extra: number = count - base * slices;
    const ranges: IndexRange[] = [];
    let start: number = 0;
    for (let i = 0; i < slices; i++) {
        const size: number = base + (i < extra ? 1 : 0);
        ranges.push([start, start + size]);
        start += size;
    }
    return ranges;
}
