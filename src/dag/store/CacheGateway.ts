/**
 * @file Cache Gateway
 *
 * Addresses artifacts in the managed cache tree and moves them through
 * their cachers. File names follow
 *
 *     <cache_path>/[<subdir>/]<prefix>_<hash>_<stage>_<artifact><ext>
 *
 * with the metadata side record at `..._<artifact>_metadata.json`.
 * Downstream tooling relies on this scheme, so it must stay stable.
 *
 * Every path written through `save` is remembered; tracked paths are what
 * store-full copies into a run folder.
 *
 * @module dag/store
 */

import path from 'path';
import { CacheIntegrityError, errorMessage_get } from '../errors.js';
import type { Cacher } from './cachers.js';
import { ArtifactMetadataSchema } from './schemas.js';
import type { ArtifactMetadata, CacheKey, CacherOptions, StorageBackend } from './types.js';

/**
 * @property backend - Where bytes go
 * @property cache_path - Root of the managed cache tree
 * @property dry - Write nothing at all
 * @property dry_cache - Write no cache entries or metadata
 */
export interface CacheGatewayOptions {
    backend: StorageBackend;
    cache_path: string;
    dry?: boolean;
    dry_cache?: boolean;
}

const METADATA_SUFFIX = '_metadata.json';

export class CacheGateway {
    readonly backend: StorageBackend;
    readonly cache_path: string;
    private readonly writesDisabled: boolean;
    private readonly tracked: string[] = [];

    constructor(options: CacheGatewayOptions) {
        this.backend = options.backend;
        this.cache_path = options.cache_path;
        this.writesDisabled = Boolean(options.dry || options.dry_cache);
    }

    /** False in dry and dry-cache modes. */
    get writable(): boolean {
        return !this.writesDisabled;
    }

    // ─── Addressing ─────────────────────────────────────────────

    /**
     * Deterministic path for an artifact. A cacher's `path_override`
     * wins outright; its `prefix` replaces the key's prefix.
     */
    path_resolve(key: CacheKey, cacher?: Cacher, suffix?: string): string {
        return this.keyPath_resolve(key, cacher?.options ?? {}, suffix ?? cacher?.extension ?? '');
    }

    /**
     * Path for a key under explicit cacher options, with `extension`
     * appended verbatim.
     */
    keyPath_resolve(key: CacheKey, options: CacherOptions, extension: string): string {
        if (options.path_override !== undefined) {
            const { dir, name, ext } = path.parse(options.path_override);
            return extension.endsWith(METADATA_SUFFIX)
                ? path.join(dir, `${name}${METADATA_SUFFIX}`)
                : path.join(dir, `${name}${ext}`);
        }
        const prefix: string = options.prefix ?? key.prefix;
        const fileName: string = `${prefix}_${key.hash}_${key.stage}_${key.artifact}${extension}`;
        return options.subdir
            ? path.join(this.cache_path, options.subdir, fileName)
            : path.join(this.cache_path, fileName);
    }

    metadataPath_resolve(key: CacheKey, cacher?: Cacher): string {
        return this.path_resolve(key, cacher, METADATA_SUFFIX);
    }

    // ─── Payload ────────────────────────────────────────────────

    /** Whether the entry exists. The payload is not deserialized. */
    exists(key: CacheKey, cacher: Cacher): boolean {
        return cacher.exists(this.backend, this.path_resolve(key, cacher));
    }

    /**
     * Save an artifact and, if given, its metadata.
     *
     * @returns The path the payload was (or, in dry modes, would have been) written to.
     */
    save(key: CacheKey, cacher: Cacher, value: unknown, metadata?: ArtifactMetadata): string {
        const target: string = this.path_resolve(key, cacher);
        if (this.writesDisabled) return target;
        const written: string = cacher.save(this.backend, target, value);
        if (cacher.tracked) this.path_track(written);
        if (metadata) this.metadata_save(key, metadata, cacher);
        return written;
    }

    /**
     * Load an artifact. Raises `CacheIntegrityError` if the entry is
     * missing or cannot be decoded.
     */
    load(key: CacheKey, cacher: Cacher): unknown {
        return cacher.load(this.backend, this.path_resolve(key, cacher));
    }

    // ─── Metadata ───────────────────────────────────────────────

    metadata_save(key: CacheKey, metadata: ArtifactMetadata, cacher?: Cacher): string {
        const target: string = this.metadataPath_resolve(key, cacher);
        if (this.writesDisabled) return target;
        this.backend.artifact_write(target, JSON.stringify(metadata, null, 2));
        if (!cacher || cacher.tracked) this.path_track(target);
        return target;
    }

    /**
     * Metadata for an entry, or null if none was written.
     */
    metadata_load(key: CacheKey, cacher?: Cacher): ArtifactMetadata | null {
        const target: string = this.metadataPath_resolve(key, cacher);
        const data: Buffer | null = this.backend.artifact_read(target);
        if (data === null) return null;
        let raw: unknown;
        try {
            raw = JSON.parse(data.toString('utf-8'));
        } catch (error: unknown) {
            throw new CacheIntegrityError(`Metadata '${target}' is not valid JSON: ${errorMessage_get(error)}`, { path: target });
        }
        const parsed = ArtifactMetadataSchema.safeParse(raw);
        if (!parsed.success) {
            throw new CacheIntegrityError(`Metadata '${target}' is malformed: ${parsed.error.message}`, { path: target });
        }
        return parsed.data;
    }

    // ─── Store-Full ─────────────────────────────────────────────

    /** Record an extra path (e.g. a stage's own `path_get` or `dir_get` output) for store-full. */
    path_track(filePath: string): void {
        if (!this.tracked.includes(filePath)) this.tracked.push(filePath);
    }

    trackedPaths_list(): string[] {
        return [...this.tracked];
    }

    /**
     * Copy every tracked entry under `targetDir`, keeping its path
     * relative to the cache root. A tracked directory is copied with
     * everything under it.
     *
     * @returns The copied file paths.
     */
    run_storeFull(targetDir: string): string[] {
        const copied: string[] = [];
        if (this.writesDisabled) return copied;
        for (const source of this.tracked) {
            if (!this.backend.path_exists(source)) continue;
            const relative: string = path.relative(this.cache_path, source);
            const target: string = relative.startsWith('..')
                ? path.join(targetDir, path.basename(source))
                : path.join(targetDir, relative);
            this.entry_copy(source, target, copied);
        }
        return copied;
    }

    private entry_copy(source: string, target: string, copied: string[]): void {
        const children: string[] = this.backend.children_list(source);
        if (children.length === 0 && this.backend.artifact_read(source) !== null) {
            this.backend.artifact_copy(source, target);
            copied.push(target);
            return;
        }
        this.backend.dir_create(target);
        for (const child of children) {
            this.entry_copy(path.join(source, child), path.join(target, child), copied);
        }
    }
}
