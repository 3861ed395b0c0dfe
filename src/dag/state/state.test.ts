/**
 * @file State Layer Tests
 *
 * Eager and lazy cells, resolve-on-access, lazy retention and snapshots.
 *
 * @module dag/state
 */

import { describe, it, expect, vi } from 'vitest';
import { StateContainer } from './StateContainer.js';
import { LazyHandle } from './LazyHandle.js';
import { CacheGateway } from '../store/CacheGateway.js';
import { MemoryBackend } from '../store/backend/memory.js';
import { JsonCacher } from '../store/cachers.js';
import type { CacheKey } from '../store/types.js';

// ═══════════════════════════════════════════════════════════════════
// Test Fixtures
// ═══════════════════════════════════════════════════════════════════

const KEY: CacheKey = { prefix: 'exp', hash: 'abc', stage: 'train', artifact: 'model' };

function handle_create(value: unknown, autoResolve: boolean = true): { handle: LazyHandle; gateway: CacheGateway } {
    const gateway = new CacheGateway({ backend: new MemoryBackend(), cache_path: 'data/cache' });
    const cacher = new JsonCacher();
    gateway.save(KEY, cacher, value);
    return { handle: new LazyHandle('model', KEY, cacher, gateway, autoResolve), gateway };
}

// ═══════════════════════════════════════════════════════════════════
// StateContainer
// ═══════════════════════════════════════════════════════════════════

describe('dag/state/StateContainer', () => {

    it('should store and return eager values', () => {
        const state = new StateContainer();
        state.set('data', [1, 2, 3]);
        expect(state.get('data')).toEqual([1, 2, 3]);
        expect(state.has('data')).toBe(true);
        expect(state.get('missing')).toBeUndefined();
    });

    it('should load a lazy cell on read', () => {
        const { handle } = handle_create({ w: 1 });
        const state = new StateContainer();
        state.lazy_set('model', handle);
        expect(state.get('model')).toEqual({ w: 1 });
    });

    it('should keep the cell lazy when retaining handles', () => {
        const { handle } = handle_create({ w: 1 });
        const load = vi.spyOn(handle, 'load');
        const state = new StateContainer();
        state.lazy_set('model', handle);
        state.get('model');
        state.get('model');
        expect(load).toHaveBeenCalledTimes(2);
        expect(state.cell_get('model')?.kind).toBe('lazy');
    });

    it('should replace the cell with the value when not retaining handles', () => {
        const { handle } = handle_create({ w: 1 });
        const load = vi.spyOn(handle, 'load');
        const state = new StateContainer({ retain_lazy: false });
        state.lazy_set('model', handle);
        state.get('model');
        state.get('model');
        expect(load).toHaveBeenCalledTimes(1);
        expect(state.cell_get('model')).toEqual({ kind: 'eager', value: { w: 1 } });
    });

    it('should return the handle when resolution is off', () => {
        const { handle } = handle_create({ w: 1 });
        const state = new StateContainer();
        state.lazy_set('model', handle);
        state.resolve = false;
        expect(state.get('model')).toBe(handle);
    });

    it('should return the handle when it opts out of auto-resolution', () => {
        const { handle } = handle_create({ w: 1 }, false);
        const state = new StateContainer();
        state.lazy_set('model', handle);
        expect(state.get('model')).toBe(handle);
    });

    it('should overwrite a lazy cell with an eager write', () => {
        const { handle } = handle_create({ w: 1 });
        const state = new StateContainer();
        state.lazy_set('model', handle);
        state.set('model', 'replaced');
        expect(state.cell_get('model')).toEqual({ kind: 'eager', value: 'replaced' });
    });

    it('should snapshot without loading lazy cells', () => {
        const { handle } = handle_create({ w: 1 });
        const load = vi.spyOn(handle, 'load');
        const state = new StateContainer();
        state.set('data', 5);
        state.lazy_set('model', handle);
        expect(state.snapshot()).toEqual({
            data: { kind: 'eager', value: 5 },
            model: { kind: 'lazy', path: 'data/cache/exp_abc_train_model.json' },
        });
        expect(load).not.toHaveBeenCalled();
    });

    it('should copy cells independently of the original', () => {
        const state = new StateContainer();
        state.set('a', 1);
        const clone: StateContainer = state.copy();
        clone.set('b', 2);
        state.delete('a');
        expect(clone.keys()).toEqual(['a', 'b']);
        expect(state.keys()).toEqual([]);
    });
});

// ═══════════════════════════════════════════════════════════════════
// LazyHandle
// ═══════════════════════════════════════════════════════════════════

describe('dag/state/LazyHandle', () => {

    it('should report its path and existence without loading', () => {
        const { handle, gateway } = handle_create([1]);
        expect(handle.path).toBe(gateway.path_resolve(KEY, new JsonCacher()));
        expect(handle.exists()).toBe(true);
        expect(handle.load()).toEqual([1]);
    });
});
