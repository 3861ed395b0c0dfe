/**
 * @file Filesystem Storage Backend
 *
 * StorageBackend against the local filesystem. `artifact_create` uses an
 * exclusive-create open ('wx'), which is atomic across processes and is
 * what the registry lockfile relies on.
 *
 * @module dag/store/backend
 */

import fs from 'fs';
import path from 'path';
import type { StorageBackend } from '../types.js';

export class FsBackend implements StorageBackend {
    artifact_write(filePath: string, data: string | Buffer): void {
        fs.mkdirSync(path.dirname(filePath), { recursive: true });
        fs.writeFileSync(filePath, data);
    }

    artifact_create(filePath: string, data: string): boolean {
        fs.mkdirSync(path.dirname(filePath), { recursive: true });
        let fd: number;
        try {
            fd = fs.openSync(filePath, 'wx');
        } catch (error: unknown) {
            if (errorCode_get(error) === 'EEXIST') return false;
            throw error;
        }
        try {
            fs.writeSync(fd, data);
        } finally {
            fs.closeSync(fd);
        }
        return true;
    }

    artifact_read(filePath: string): Buffer | null {
        if (!fs.existsSync(filePath) || !fs.statSync(filePath).isFile()) return null;
        return fs.readFileSync(filePath);
    }

    artifact_remove(filePath: string): void {
        fs.rmSync(filePath, { force: true });
    }

    artifact_copy(source: string, target: string): void {
        fs.mkdirSync(path.dirname(target), { recursive: true });
        fs.copyFileSync(source, target);
    }

    path_exists(filePath: string): boolean {
        return fs.existsSync(filePath);
    }

    children_list(dirPath: string): string[] {
        if (!fs.existsSync(dirPath) || !fs.statSync(dirPath).isDirectory()) return [];
        return fs.readdirSync(dirPath).sort();
    }

    dir_create(dirPath: string): void {
        fs.mkdirSync(dirPath, { recursive: true });
    }
}

function errorCode_get(error: unknown): string | null {
    if (typeof error !== 'object' || error === null) return null;
    const code: unknown = Reflect.get(error, 'code');
    return typeof code === 'string' ? code : null;
}
