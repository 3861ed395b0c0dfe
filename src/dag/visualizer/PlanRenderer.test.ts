/**
 * @file Plan Renderer Tests
 *
 * @module dag/visualizer
 */

import { describe, it, expect } from 'vitest';
import { GraphBuilder } from '../graph/ExecutionGraph.js';
import { plan_compute } from '../graph/planner.js';
import type { GraphNode } from '../graph/types.js';
import { plan_render, stageAction_get } from './PlanRenderer.js';

function node_make(stage: string, index: number, outputs: string[], cached: boolean, input?: string): GraphNode {
    return {
        key: `${stage}#${index}`,
        identity: { stage, index },
        record_id: 0,
        record_name: 'P1',
        aggregate: false,
        inputs_declared: true,
        inputs: input ? [{ name: input, record_id: 0, producer: `${input === 'raw' ? 'A#0' : 'B#1'}` }] : [],
        outputs,
        cacheable: true,
        cached,
        overwrite: false,
    };
}

describe('dag/visualizer/PlanRenderer', () => {

    it('should render one line per call with cache status and action', () => {
        const builder = new GraphBuilder();
        builder.node_add(node_make('A', 0, ['raw'], false));
        builder.node_add(node_make('B', 1, ['model'], true, 'raw'));
        builder.node_add(node_make('C', 2, ['score'], false, 'model'));
        const text = plan_render(plan_compute(builder.build()), { color: false });
        expect(text.split('\n')).toEqual([
            'Plan: 1 of 3 stage calls execute',
            'Record 0 (P1)',
            '  A#0  missing  skip',
            '  B#1  cached   lazy',
            '  C#2  missing  run (leaf)',
        ]);
    });

    it('should warn about a non-prunable graph', () => {
        const builder = new GraphBuilder();
        builder.node_add({ ...node_make('summary', 0, [], false), aggregate: true, inputs_declared: false });
        const lines = plan_render(plan_compute(builder.build()), { color: false }).split('\n');
        expect(lines[1]).toBe('An aggregate does not declare its inputs; the run will be sequential');
    });

    it('should classify actions', () => {
        const base = { identity: { stage: 's', index: 0 }, leaf: false };
        expect(stageAction_get({ ...base, cached: true, must_execute: true })).toBe('run');
        expect(stageAction_get({ ...base, cached: true, must_execute: false })).toBe('lazy');
        expect(stageAction_get({ ...base, cached: false, must_execute: false })).toBe('skip');
    });
});
