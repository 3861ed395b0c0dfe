/**
 * @file Registry Lockfile
 *
 * Mutual exclusion for bookkeeping files shared between processes
 * (the run registry and the params registry). The lock is a sibling
 * `<path>.lock` file created with exclusive-create semantics; whoever
 * creates it holds the lock. A lock older than `stale_ms` is assumed to
 * belong to a dead process and is broken.
 *
 * Cache entries themselves are never locked: concurrent processes only
 * ever write disjoint keys.
 *
 * @module dag/store
 */

import { LockHeldError } from '../errors.js';
import type { StorageBackend } from './types.js';

export interface LockOptions {
    timeout_ms?: number;
    stale_ms?: number;
    /** Receives retry and stale-lock notices. */
    warn?: (message: string) => void;
}

interface LockContent {
    pid: number;
    started_ms: number;
}

const SLEEP_CELL: Int32Array = new Int32Array(new SharedArrayBuffer(4));

function sleep_sync(ms: number): void {
    Atomics.wait(SLEEP_CELL, 0, 0, ms);
}

/** 50, 100, 200, 400, ... capped at 1000 ms. */
function backoff(attempt: number): number {
    return Math.min(50 * 2 ** attempt, 1000);
}

function lockContent_parse(data: Buffer | null): LockContent | null {
    if (data === null) return null;
    try {
        const raw: unknown = JSON.parse(data.toString('utf-8'));
        if (typeof raw !== 'object' || raw === null) return null;
        const pid: unknown = Reflect.get(raw, 'pid');
        const started: unknown = Reflect.get(raw, 'started_ms');
        if (typeof pid !== 'number' || typeof started !== 'number') return null;
        return { pid, started_ms: started };
    } catch {
        return null;
    }
}

/**
 * Take the lock guarding `targetPath`.
 *
 * @returns Release function. Call it in a `finally`.
 * @throws LockHeldError if the lock is not free within `timeout_ms`.
 */
export function lockfile_acquire(
    backend: StorageBackend,
    targetPath: string,
    options: LockOptions = {},
): () => void {
    const lockPath: string = `${targetPath}.lock`;
    const timeout: number = options.timeout_ms ?? 10000;
    const stale: number = options.stale_ms ?? 600000;
    const started: number = Date.now();
    let attempt: number = 0;

    for (;;) {
        const content: LockContent = { pid: process.pid, started_ms: Date.now() };
        if (backend.artifact_create(lockPath, JSON.stringify(content))) {
            return (): void => backend.artifact_remove(lockPath);
        }

        const holder: LockContent | null = lockContent_parse(backend.artifact_read(lockPath));
        const age: number = holder ? Date.now() - holder.started_ms : 0;
        if (age > stale) {
            options.warn?.(`Breaking stale lock ${lockPath}`);
            backend.artifact_remove(lockPath);
            continue;
        }

        if (Date.now() - started >= timeout) {
            throw new LockHeldError(`Could not acquire ${lockPath} within ${timeout}ms`, {
                path: lockPath,
                holder_pid: holder ? holder.pid : null,
            });
        }
        sleep_sync(backoff(attempt++));
    }
}

/**
 * Run `fn` while holding the lock for `targetPath`.
 */
export function lock_with<T>(
    backend: StorageBackend,
    targetPath: string,
    fn: () => T,
    options: LockOptions = {},
): T {
    const release: () => void = lockfile_acquire(backend, targetPath, options);
    try {
        return fn();
    } finally {
        release();
    }
}
