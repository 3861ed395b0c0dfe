/**
 * @file Plan Renderer
 *
 * Text rendering of a mapped plan for a dry-plan print: one block per
 * record, one line per stage call, showing cache status and what the
 * execution phase will do with the call.
 *
 *     Plan: 1 of 3 stage calls execute
 *     Record 0 (P1)
 *       load#0   cached   lazy
 *       train#1  cached   lazy
 *       test#2   missing  run (leaf)
 *
 * @module dag/visualizer
 */

import chalk from 'chalk';
import { identity_format } from '../graph/types.js';
import type { ExecutionPlan, RecordSummary, StageSummary } from '../graph/types.js';

export interface PlanRenderOptions {
    /** ANSI colour (default true). */
    color?: boolean;
}

type PlanAction = 'run' | 'lazy' | 'skip';

/**
 * What the execution phase does with a call: run it, leave its cached
 * outputs for lazy loading, or skip it.
 */
export function stageAction_get(stage: StageSummary): PlanAction {
    if (stage.must_execute) return 'run';
    return stage.cached ? 'lazy' : 'skip';
}

export function plan_render(plan: ExecutionPlan, options: PlanRenderOptions = {}): string {
    const color: boolean = options.color !== false;
    const paint = (style: (text: string) => string, text: string): string => (color ? style(text) : text);

    const records: RecordSummary[] = plan.records_summarize();
    const stages: StageSummary[] = records.flatMap((record: RecordSummary): StageSummary[] => record.stages);
    const width: number = stages.reduce(
        (max: number, stage: StageSummary): number => Math.max(max, identity_format(stage.identity).length),
        0,
    );

    const lines: string[] = [
        paint(chalk.bold, `Plan: ${plan.must_execute.size} of ${plan.graph.nodes.size} stage calls execute`),
    ];
    if (!plan.graph.prunable) {
        lines.push(paint(chalk.yellow, 'An aggregate does not declare its inputs; the run will be sequential'));
    }

    for (const record of records) {
        lines.push(paint(chalk.cyan, `Record ${record.record_id} (${record.record_name})`));
        for (const stage of record.stages) {
            const action: PlanAction = stageAction_get(stage);
            const key: string = identity_format(stage.identity).padEnd(width);
            const cache: string = (stage.cached ? 'cached' : 'missing').padEnd(7);
            const actionText: string = action.padEnd(4);
            const styled: string = action === 'run'
                ? paint(chalk.green, actionText)
                : action === 'lazy' ? paint(chalk.blue, actionText) : paint(chalk.gray, actionText);
            lines.push(`  ${key}  ${cache}  ${styled}${stage.leaf ? '(leaf)' : ''}`.trimEnd());
        }
    }
    return lines.join('\n');
}
