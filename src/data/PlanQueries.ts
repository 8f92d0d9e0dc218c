/**
 * @fileoverview Read-only lookups over a project plan
 * @module data/PlanQueries
 *
 * Linear scans; for repeated lookups inside a calculation build a TaskGraph.
 */

import type { ProjectPlan, StatusKind, Task } from '../types';
import { hasStatus } from '../core/StatusTags';

export function getTaskById(plan: ProjectPlan, taskId: string): Task | undefined {
  return plan.tasks.find(task => task.id === taskId);
}

export function getTasksBySection(plan: ProjectPlan, section: string): Task[] {
  return plan.tasks.filter(task => task.section === section);
}

/**
 * Distinct section labels, sorted
 */
export function getSections(plan: ProjectPlan): string[] {
  const sections = new Set<string>();
  for (const task of plan.tasks) {
    if (task.section) sections.add(task.section);
  }
  return [...sections].sort();
}

/**
 * Tasks the given task depends on, in declared order.
 * Unknown IDs are skipped.
 */
export function getTaskDependencies(plan: ProjectPlan, taskId: string): Task[] {
  const task = getTaskById(plan, taskId);
  if (!task) return [];

  const dependencies: Task[] = [];
  for (const depId of task.dependencies) {
    const dep = getTaskById(plan, depId);
    if (dep) dependencies.push(dep);
  }
  return dependencies;
}

/**
 * Tasks that depend on the given task, in plan order
 */
export function getTaskDependents(plan: ProjectPlan, taskId: string): Task[] {
  return plan.tasks.filter(task => task.dependencies.includes(taskId));
}

export function getMilestones(plan: ProjectPlan): Task[] {
  return plan.tasks.filter(task => task.isMilestone);
}

export function getTasksWithStatus(plan: ProjectPlan, kind: StatusKind): Task[] {
  return plan.tasks.filter(task => hasStatus(task, kind));
}
