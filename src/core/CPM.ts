/**
 * ============================================================================
 * CPM.ts - Critical Path Method Engine
 * ============================================================================
 *
 * Pure calculation module for Critical Path Method analysis.
 * Runs on a plan the Scheduler has already dated; nothing is mutated.
 *
 * CPM ALGORITHM OVERVIEW:
 * ┌─────────────────────────────────────────────────────────────────────────┐
 * │  1. FORWARD PASS (topological order)                                    │
 * │     - No predecessors: ES = task start                                  │
 * │     - Otherwise:       ES = Max(Predecessor end) + 1 working day        │
 * ├─────────────────────────────────────────────────────────────────────────┤
 * │  2. BACKWARD PASS (reverse topological order)                           │
 * │     - No successors:   LS = ES                                          │
 * │     - Otherwise:       LS = Min(Successor LS) - Duration working days   │
 * ├─────────────────────────────────────────────────────────────────────────┤
 * │  3. CRITICAL PATH                                                       │
 * │     - Total Float = LS - ES (working days, signed)                      │
 * │     - Tasks with ES == LS are critical                                  │
 * └─────────────────────────────────────────────────────────────────────────┘
 */

import type { CPMResult, ISODate, ProjectPlan, StatusTag, Task, TaskTiming } from '../types';
import { DateUtils } from './DateUtils';
import { TaskGraph, type TaskGraphIndex } from './TaskGraph';
import { clonePlan } from './PlanCopy';

/**
 * @fileoverview Critical Path Method (CPM) calculation engine
 * @module core/CPM
 */

/**
 * CPM analysis options
 */
export interface CPMOptions {
    /** Log a summary of the analysis */
    verbose?: boolean;
}

/**
 * CPM calculation context
 */
interface CPMContext {
    graph: TaskGraphIndex;
    order: string[];
    workingDays: readonly number[];
    earlyStart: Map<string, ISODate | null>;
    lateStart: Map<string, ISODate | null>;
}

/**
 * CPM (Critical Path Method) Calculator
 * Static class providing pure calculation functions
 */
export class CPM {

    /**
     * Run the forward and backward passes over a dated plan
     *
     * @param plan - Scheduled plan
     * @param options - Additional options
     * @returns Per-task timings and the zero-float tasks
     * @throws CycleDetectedError if the dependency graph has a cycle
     */
    static analyze(plan: ProjectPlan, options: CPMOptions = {}): CPMResult {
        const graph = TaskGraph.build(plan);
        const ctx: CPMContext = {
            graph,
            order: TaskGraph.topologicalOrder(graph),
            workingDays: plan.workingDays,
            earlyStart: new Map(),
            lateStart: new Map(),
        };

        CPM._forwardPass(ctx);
        CPM._backwardPass(ctx);

        const timings = new Map<string, TaskTiming>();
        const criticalTasks: Task[] = [];

        for (const id of ctx.order) {
            const earlyStart = ctx.earlyStart.get(id) ?? null;
            const lateStart = ctx.lateStart.get(id) ?? null;
            const isCritical = earlyStart !== null && earlyStart === lateStart;
            const totalFloat = earlyStart !== null && lateStart !== null
                ? CPM._totalFloat(earlyStart, lateStart, ctx.workingDays)
                : null;

            timings.set(id, { id, earlyStart, lateStart, totalFloat, isCritical });

            const task = graph.taskMap.get(id);
            if (isCritical && task) criticalTasks.push(task);
        }

        if (options.verbose) {
            console.log(`[CPM] ${criticalTasks.length} of ${plan.tasks.length} tasks on the critical path`);
        }

        return { timings, criticalTasks };
    }

    /**
     * Zero-float tasks, in topological order
     */
    static getCriticalPath(plan: ProjectPlan): Task[] {
        return CPM.analyze(plan).criticalTasks;
    }

    /**
     * Copy of the plan with the `critical` status tag on every critical task
     * (and removed from tasks that are no longer critical)
     */
    static markCritical(plan: ProjectPlan): ProjectPlan {
        const { timings } = CPM.analyze(plan);
        const result = clonePlan(plan);
        const critical: StatusTag = { kind: 'critical' };

        for (const task of result.tasks) {
            const others = task.status.filter(tag => tag.kind !== 'critical');
            task.status = timings.get(task.id)?.isCritical
                ? [...others, critical]
                : others;
        }

        return result;
    }

    /**
     * Signed working-day float; zero only when LS == ES.
     * LS falls before ES when a task starts on a non-working day.
     * @private
     */
    private static _totalFloat(earlyStart: ISODate, lateStart: ISODate, workingDays: readonly number[]): number {
        if (earlyStart === lateStart) return 0;
        if (lateStart > earlyStart) {
            return Math.max(1, DateUtils.calcWorkDaysDifference(earlyStart, lateStart, workingDays));
        }
        return -Math.max(1, DateUtils.calcWorkDaysDifference(lateStart, earlyStart, workingDays));
    }

    /**
     * Forward pass - Early Start (ES)
     * @private
     */
    private static _forwardPass(ctx: CPMContext): void {
        const { graph, order, workingDays, earlyStart } = ctx;

        for (const id of order) {
            const task = graph.taskMap.get(id);
            if (!task) continue;

            const latestEnd = DateUtils.maxDate(
                TaskGraph.getDependencies(graph, id)
                    .map(dep => dep.end)
                    .filter((end): end is ISODate => end !== undefined)
            );

            earlyStart.set(
                id,
                latestEnd !== null ? DateUtils.addWorkingDays(latestEnd, 1, workingDays) : task.start ?? null
            );
        }
    }

    /**
     * Backward pass - Late Start (LS)
     * @private
     */
    private static _backwardPass(ctx: CPMContext): void {
        const { graph, order, workingDays, earlyStart, lateStart } = ctx;

        for (let i = order.length - 1; i >= 0; i--) {
            const id = order[i];
            const task = graph.taskMap.get(id);
            if (!task) continue;

            const successors = graph.dependents.get(id) ?? new Set<string>();
            if (successors.size === 0) {
                // Path-terminal tasks have zero float by definition
                lateStart.set(id, earlyStart.get(id) ?? null);
                continue;
            }

            const minSuccessorLS = DateUtils.minDate(
                [...successors]
                    .map(succId => lateStart.get(succId) ?? null)
                    .filter((ls): ls is ISODate => ls !== null)
            );

            lateStart.set(
                id,
                minSuccessorLS !== null
                    ? DateUtils.subtractWorkingDays(minSuccessorLS, task.duration ?? 0, workingDays)
                    : null
            );
        }
    }
}

export default CPM;
