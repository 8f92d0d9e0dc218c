/**
 * @fileoverview Per-task date derivation
 * @module core/DateDeriver
 *
 * Resolves start / end / duration from whatever subset is known plus the
 * latest end date among the task's dependencies. Called by the Scheduler
 * once every dependency of the task has been dated.
 *
 * Resolution order:
 * 1. Milestones are forced to duration 0
 * 2. Dependency-driven start: one working day after the latest dependency
 *    end. This overrides any start supplied on the task.
 * 3. start + duration -> end
 *    start + end      -> duration
 *    end + duration   -> start
 * 4. Still no start: fall back to the plan start (or today), then
 *    recompute end from duration
 */

import type { ISODate, Task } from '../types';
import { DateUtils } from './DateUtils';

/**
 * Inputs shared by every derivation in a run
 */
export interface DerivationContext {
    workingDays: readonly number[];
    /** Start used when nothing else dates the task */
    fallbackStart: (task: Task) => ISODate;
}

export class DateDeriver {

    /**
     * Derive dates for a task, returning a new task object
     *
     * @param task - Task to date (not mutated)
     * @param dependencies - The task's already-dated dependencies
     * @param ctx - Run context
     */
    static derive(task: Task, dependencies: readonly Task[], ctx: DerivationContext): Task {
        const { workingDays } = ctx;
        const result: Task = { ...task };

        if (result.isMilestone) {
            result.duration = 0;
        }

        if (result.dependencies.length > 0) {
            const latestEnd = DateUtils.maxDate(
                dependencies.map(dep => dep.end).filter((end): end is ISODate => end !== undefined)
            );
            if (latestEnd !== null) {
                result.start = DateUtils.addWorkingDays(latestEnd, 1, workingDays);
            }
        }

        if (result.start !== undefined && result.duration !== undefined) {
            result.end = DateDeriver.endFrom(result.start, result.duration, workingDays);
        } else if (result.start !== undefined && result.end !== undefined) {
            result.duration = DateUtils.countWorkingDays(result.start, result.end, workingDays);
        } else if (result.end !== undefined && result.duration !== undefined) {
            result.start = DateDeriver.startFrom(result.end, result.duration, workingDays);
        }

        if (result.start === undefined) {
            result.start = ctx.fallbackStart(result);
            if (result.duration !== undefined) {
                result.end = DateDeriver.endFrom(result.start, result.duration, workingDays);
            }
        }

        return result;
    }

    /**
     * End date of a task spanning `duration` working days from `start`.
     * Zero-duration tasks end on their start date.
     */
    static endFrom(start: ISODate, duration: number, workingDays: readonly number[]): ISODate {
        return duration > 0 ? DateUtils.addWorkingDays(start, duration - 1, workingDays) : start;
    }

    /**
     * Start date of a task spanning `duration` working days up to `end`
     */
    static startFrom(end: ISODate, duration: number, workingDays: readonly number[]): ISODate {
        return duration > 0 ? DateUtils.subtractWorkingDays(end, duration - 1, workingDays) : end;
    }
}

export default DateDeriver;
