/**
 * @file Lazy Handle
 *
 * Placeholder for an artifact that lives in the cache. A handle knows
 * where its entry is and how to load it; the state container decides
 * when to load.
 *
 * @module dag/state
 */

import type { Cacher } from '../store/cachers.js';
import type { CacheGateway } from '../store/CacheGateway.js';
import type { CacheKey } from '../store/types.js';

export class LazyHandle {
    /**
     * @param name - Artifact name
     * @param key - Cache key the entry was written under
     * @param cacher - Cacher that wrote it
     * @param gateway - Gateway to load through
     * @param auto_resolve - When false, reads return the handle itself
     */
    constructor(
        readonly name: string,
        readonly key: CacheKey,
        readonly cacher: Cacher,
        private readonly gateway: CacheGateway,
        readonly auto_resolve: boolean = true,
    ) {}

    get path(): string {
        return this.gateway.path_resolve(this.key, this.cacher);
    }

    /** Whether the backing entry is present. Nothing is loaded. */
    exists(): boolean {
        return this.gateway.exists(this.key, this.cacher);
    }

    load(): unknown {
        return this.gateway.load(this.key, this.cacher);
    }
}
