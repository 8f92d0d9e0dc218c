/**
 * @fileoverview Copy helpers so calculations never write to caller-owned plans
 * @module core/PlanCopy
 */

import type { ProjectPlan, Task } from '../types';

export function cloneTask(task: Task): Task {
    return {
        ...task,
        dependencies: [...task.dependencies],
        status: task.status.map(tag => ({ ...tag })),
    };
}

export function clonePlan(plan: ProjectPlan): ProjectPlan {
    return {
        ...plan,
        tasks: plan.tasks.map(cloneTask),
        workingDays: [...plan.workingDays],
    };
}
