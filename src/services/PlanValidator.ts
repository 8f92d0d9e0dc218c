/**
 * @fileoverview Plan Validator
 * @module services/PlanValidator
 *
 * Non-destructive structural and date-logic checks. Findings are returned
 * as data; nothing here throws or interrupts scheduling.
 *
 * An empty result means no blocking issues. It does not promise that every
 * underspecified task will end up fully dated.
 */

import type { Diagnostic, ProjectPlan } from '../types';
import { TaskGraph } from '../core/TaskGraph';
import { CycleDetectedError } from '../core/errors';

export class PlanValidator {

    /**
     * Validate a plan
     *
     * Checks, in order:
     * - Plan has tasks (short-circuits when empty)
     * - Each task has a start, a duration, or dependencies to be dated from
     * - Start is not after end when both are given
     * - Dependency graph is acyclic
     */
    static validate(plan: ProjectPlan): Diagnostic[] {
        if (plan.tasks.length === 0) {
            return [{ code: 'EMPTY_PLAN', message: 'Project plan contains no tasks' }];
        }

        const diagnostics: Diagnostic[] = [];

        for (const task of plan.tasks) {
            if (task.start === undefined && task.duration === undefined && task.dependencies.length === 0) {
                diagnostics.push({
                    code: 'MISSING_TIME_INFO',
                    message: `Task '${task.name}' (${task.id}) is missing basic time information`,
                    taskId: task.id,
                });
            }

            if (task.start !== undefined && task.end !== undefined && task.start > task.end) {
                diagnostics.push({
                    code: 'START_AFTER_END',
                    message: `Task '${task.name}' (${task.id}) starts after it ends`,
                    taskId: task.id,
                });
            }
        }

        const { unresolved } = TaskGraph.drain(TaskGraph.build(plan));
        if (unresolved.length > 0) {
            diagnostics.push({
                code: 'CIRCULAR_DEPENDENCY',
                message: new CycleDetectedError(unresolved).message,
            });
        }

        return diagnostics;
    }
}

export default PlanValidator;
