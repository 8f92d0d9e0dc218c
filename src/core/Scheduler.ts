/**
 * ============================================================================
 * Scheduler.ts - Topological Date Scheduler
 * ============================================================================
 *
 * Turns a partially-dated plan into a fully-dated one. Kahn's algorithm
 * visits tasks in dependency order and dates each one as it is popped,
 * so every dependency is already dated when its dependents are derived.
 *
 * ┌─────────────────────────────────────────────────────────────────────────┐
 * │  1. Seed the queue with every zero in-degree task (plan order)          │
 * │  2. Pop FIFO, derive dates, release dependents whose in-degree hits 0   │
 * │  3. Anything left unvisited is in (or behind) a cycle -> fail the run   │
 * │  4. Plan start/end = min task start / max task end                      │
 * └─────────────────────────────────────────────────────────────────────────┘
 *
 * The input plan is never mutated; a new plan is returned.
 */

import type { ISODate, ProjectPlan, ScheduleOptions, Task } from '../types';
import { CycleDetectedError, MissingPlanStartError } from './errors';
import { DateDeriver, type DerivationContext } from './DateDeriver';
import { DateUtils } from './DateUtils';
import { TaskGraph } from './TaskGraph';
import { clonePlan } from './PlanCopy';

/**
 * @fileoverview Topological scheduler
 * @module core/Scheduler
 */

/**
 * Scheduler
 * Static class; each call builds its own private TaskGraph
 */
export class Scheduler {

    /**
     * Date every task in a plan
     *
     * @param plan - Plan snapshot (not mutated)
     * @param options - Clock and fallback policy
     * @returns New plan with derived task dates and plan bounds
     * @throws CycleDetectedError if some tasks cannot be ordered
     * @throws MissingPlanStartError in strict mode when an undated task has no fallback
     */
    static schedule(plan: ProjectPlan, options: ScheduleOptions = {}): ProjectPlan {
        const result = clonePlan(plan);
        if (result.tasks.length === 0) {
            return result;
        }

        const graph = TaskGraph.build(result);
        const ctx: DerivationContext = {
            workingDays: result.workingDays,
            fallbackStart: Scheduler._fallbackStart(plan, options),
        };

        const inDegree = new Map(graph.inDegree);
        const queue: string[] = [];
        for (const [taskId, degree] of inDegree) {
            if (degree === 0) queue.push(taskId);
        }

        const dated = new Map<string, Task>();

        for (let head = 0; head < queue.length; head++) {
            const taskId = queue[head];
            if (dated.has(taskId)) continue;

            const task = graph.taskMap.get(taskId);
            if (!task) continue;

            const dependencies: Task[] = [];
            for (const depId of graph.dependencies.get(taskId) ?? []) {
                const dep = dated.get(depId);
                if (dep) dependencies.push(dep);
            }
            dated.set(taskId, DateDeriver.derive(task, dependencies, ctx));

            for (const dependentId of graph.dependents.get(taskId) ?? []) {
                const degree = (inDegree.get(dependentId) ?? 0) - 1;
                inDegree.set(dependentId, degree);
                if (degree === 0) queue.push(dependentId);
            }
        }

        if (dated.size < result.tasks.length) {
            const unprocessed = result.tasks.map(t => t.id).filter(id => !dated.has(id));
            throw new CycleDetectedError(unprocessed);
        }

        // Preserve insertion order for stable output
        result.tasks = result.tasks.map(task => dated.get(task.id) ?? task);

        const start = DateUtils.minDate(Scheduler._defined(result.tasks.map(t => t.start)));
        const end = DateUtils.maxDate(Scheduler._defined(result.tasks.map(t => t.end)));
        if (start !== null) result.start = start;
        if (end !== null) result.end = end;

        if (options.verbose) {
            console.log(`[Scheduler] Scheduled ${result.tasks.length} tasks: ${result.start ?? '?'} -> ${result.end ?? '?'}`);
        }

        return result;
    }

    /**
     * Fallback start for tasks nothing else dates.
     * The clock is read at most once per run so every fallback agrees.
     */
    private static _fallbackStart(plan: ProjectPlan, options: ScheduleOptions): (task: Task) => ISODate {
        const planStart = plan.start;
        let today: ISODate | null = null;

        return (task: Task): ISODate => {
            if (planStart !== undefined) return planStart;
            if (options.requirePlanStart) {
                throw new MissingPlanStartError(task.id);
            }
            if (today === null) {
                today = options.today ? options.today() : DateUtils.today();
            }
            return today;
        };
    }

    private static _defined(dates: Array<ISODate | undefined>): ISODate[] {
        return dates.filter((d): d is ISODate => d !== undefined);
    }
}

export default Scheduler;
