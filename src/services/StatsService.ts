/**
 * @fileoverview Stats Service - Aggregate figures for a scheduled plan
 * @module services/StatsService
 *
 * Pure aggregation; run it on the output of Scheduler.schedule().
 */

import type { ProjectPlan, ScheduleStatistics, Task } from '../types';
import { CPM } from '../core/CPM';
import { DateUtils } from '../core/DateUtils';
import { hasStatus } from '../core/StatusTags';
import { getSections } from '../data/PlanQueries';

/**
 * Stats computation options
 */
export interface StatsOptions {
  /** Critical path already computed for this plan (skips a second CPM run) */
  criticalPath?: readonly Task[];
}

/**
 * Stats Service
 */
export class StatsService {

  /**
   * Compute statistics for a scheduled plan
   *
   * @param plan - Scheduled plan
   * @param options - Precomputed inputs
   * @throws CycleDetectedError when the critical path has to be computed on a cyclic plan
   */
  static compute(plan: ProjectPlan, options: StatsOptions = {}): ScheduleStatistics {
    const totalTasks = plan.tasks.length;
    const completedTasks = plan.tasks.filter(task => hasStatus(task, 'done')).length;
    const activeTasks = plan.tasks.filter(task => hasStatus(task, 'active')).length;
    const milestoneCount = plan.tasks.filter(task => task.isMilestone).length;

    const totalDuration = plan.start !== undefined && plan.end !== undefined
      ? DateUtils.countWorkingDays(plan.start, plan.end, plan.workingDays) + 1
      : 0;

    const criticalPath = options.criticalPath ?? CPM.getCriticalPath(plan);

    return {
      totalTasks,
      completedTasks,
      activeTasks,
      milestoneCount,
      totalDuration,
      startDate: plan.start ?? null,
      endDate: plan.end ?? null,
      completionRate: totalTasks > 0 ? (completedTasks / totalTasks) * 100 : 0,
      criticalPathLength: criticalPath.length,
      sections: getSections(plan),
    };
  }
}

export default StatsService;
