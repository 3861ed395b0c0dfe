/**
 * @file In-Memory Storage Backend
 *
 * StorageBackend over a flat map of normalized paths. Directories are
 * tracked explicitly so `children_list` and `path_exists` behave like a
 * filesystem. Used by tests and by dry tooling that must not touch disk.
 *
 * @module dag/store/backend
 */

import path from 'path';
import type { StorageBackend } from '../types.js';

/**
 * Memory-backed StorageBackend.
 */
export class MemoryBackend implements StorageBackend {
    private readonly files: Map<string, Buffer> = new Map();
    private readonly dirs: Set<string> = new Set(['/']);

    artifact_write(filePath: string, data: string | Buffer): void {
        const normalized: string = path_normalize(filePath);
        this.dir_create(path.posix.dirname(normalized));
        this.files.set(normalized, Buffer.from(data));
    }

    artifact_create(filePath: string, data: string): boolean {
        if (this.path_exists(filePath)) return false;
        this.artifact_write(filePath, data);
        return true;
    }

    artifact_read(filePath: string): Buffer | null {
        const data: Buffer | undefined = this.files.get(path_normalize(filePath));
        return data ? Buffer.from(data) : null;
    }

    artifact_remove(filePath: string): void {
        this.files.delete(path_normalize(filePath));
    }

    artifact_copy(source: string, target: string): void {
        const data: Buffer | null = this.artifact_read(source);
        if (data === null) {
            throw new Error(`ENOENT: no such file '${source}'`);
        }
        this.artifact_write(target, data);
    }

    path_exists(filePath: string): boolean {
        const normalized: string = path_normalize(filePath);
        return this.files.has(normalized) || this.dirs.has(normalized);
    }

    children_list(dirPath: string): string[] {
        const normalized: string = path_normalize(dirPath);
        if (!this.dirs.has(normalized)) return [];
        const names: Set<string> = new Set();
        for (const entry of [...this.dirs, ...this.files.keys()]) {
            if (entry !== normalized && path.posix.dirname(entry) === normalized) {
                names.add(path.posix.basename(entry));
            }
        }
        return [...names].sort();
    }

    dir_create(dirPath: string): void {
        let current: string = path_normalize(dirPath);
        while (!this.dirs.has(current)) {
            this.dirs.add(current);
            current = path.posix.dirname(current);
        }
    }
}

/** Resolve to an absolute posix path with no trailing slash. */
function path_normalize(filePath: string): string {
    return path.posix.resolve('/', filePath);
}
