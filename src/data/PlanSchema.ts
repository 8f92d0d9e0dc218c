/**
 * @fileoverview Plan document boundary
 * @module data/PlanSchema
 *
 * Upstream parsers hand over plain JSON; this module is where a document
 * becomes a ProjectPlan. It enforces the invariants the scheduler relies
 * on but does not re-check:
 * - task IDs unique
 * - every dependency refers to a task in the same plan
 * - no task depends on itself
 * - milestones carry no non-zero duration
 *
 * Cycles are not checked here (see PlanValidator / Scheduler).
 */

import { z } from 'zod';
import type { ProjectPlan, Task } from '../types';
import { DateUtils } from '../core/DateUtils';
import { DEFAULT_PLAN_TITLE, DEFAULT_PLAN_VERSION, DEFAULT_WORKING_DAYS } from '../core/Constants';
import { PlanValidationError } from '../core/errors';
import { formatStatusTag, parseStatusTags } from '../core/StatusTags';

const isoDate = z.string().refine(value => DateUtils.isValidISODate(value), {
  message: 'must be a YYYY-MM-DD date',
});

export const taskDocumentSchema = z.object({
  id: z.string().trim().min(1, 'task id is required'),
  name: z.string().min(1, 'task name is required'),
  dependencies: z.array(z.string()).default([]),
  start: isoDate.nullish(),
  end: isoDate.nullish(),
  duration: z.number().int().nonnegative().nullish(),
  isMilestone: z.boolean().default(false),
  status: z.array(z.string()).default([]),
  section: z.string().nullish(),
  description: z.string().nullish(),
  assignee: z.string().nullish(),
});

export const planDocumentSchema = z
  .object({
    title: z.string().default(DEFAULT_PLAN_TITLE),
    description: z.string().nullish(),
    start: isoDate.nullish(),
    end: isoDate.nullish(),
    tasks: z.array(taskDocumentSchema).default([]),
    workingDays: z.array(z.number().int().min(0).max(6)).min(1).default([...DEFAULT_WORKING_DAYS]),
    version: z.string().default(DEFAULT_PLAN_VERSION),
  })
  .superRefine((plan, ctx) => {
    const ids = new Set<string>();
    plan.tasks.forEach((task, index) => {
      if (ids.has(task.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['tasks', index, 'id'],
          message: `Duplicate task id "${task.id}"`,
        });
      }
      ids.add(task.id);
    });

    plan.tasks.forEach((task, index) => {
      task.dependencies.forEach((depId, depIndex) => {
        if (depId === task.id) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['tasks', index, 'dependencies', depIndex],
            message: `Task "${task.id}" depends on itself`,
          });
        } else if (!ids.has(depId)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['tasks', index, 'dependencies', depIndex],
            message: `Task "${task.id}" depends on unknown task "${depId}"`,
          });
        }
      });

      if (task.isMilestone && task.duration !== undefined && task.duration !== null && task.duration !== 0) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['tasks', index, 'duration'],
          message: `Milestone "${task.id}" must have duration 0`,
        });
      }
    });
  });

export type TaskDocument = z.input<typeof taskDocumentSchema>;
export type PlanDocument = z.input<typeof planDocumentSchema>;
type ParsedTask = z.output<typeof taskDocumentSchema>;

/**
 * Validate a plan document and build a ProjectPlan
 *
 * `workingDays` uses JavaScript weekday numbering: 0 = Sunday, 1 = Monday,
 * ..., 6 = Saturday. Producers numbering from 0 = Monday must shift by one
 * (Mon-Fri is `[1, 2, 3, 4, 5]`, not `[0, 1, 2, 3, 4]`).
 *
 * @param input - Parsed JSON from an upstream collaborator
 * @throws PlanValidationError listing every issue found
 */
export function parsePlan(input: unknown): ProjectPlan {
  const parsed = planDocumentSchema.safeParse(input);
  if (!parsed.success) {
    throw new PlanValidationError(
      parsed.error.issues.map(issue =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
      )
    );
  }

  const doc = parsed.data;
  const plan: ProjectPlan = {
    title: doc.title,
    tasks: doc.tasks.map(toTask),
    workingDays: [...new Set(doc.workingDays)].sort((a, b) => a - b),
    version: doc.version,
  };
  if (doc.description != null) plan.description = doc.description;
  if (doc.start != null) plan.start = doc.start;
  if (doc.end != null) plan.end = doc.end;
  return plan;
}

/**
 * Turn a plan back into its document form (for renderers and storage)
 */
export function serializePlan(plan: ProjectPlan): PlanDocument {
  return {
    title: plan.title,
    ...(plan.description !== undefined ? { description: plan.description } : {}),
    ...(plan.start !== undefined ? { start: plan.start } : {}),
    ...(plan.end !== undefined ? { end: plan.end } : {}),
    tasks: plan.tasks.map(fromTask),
    workingDays: [...plan.workingDays],
    version: plan.version,
  };
}

function toTask(doc: ParsedTask): Task {
  const task: Task = {
    id: doc.id,
    name: doc.name,
    dependencies: [...doc.dependencies],
    isMilestone: doc.isMilestone,
    status: parseStatusTags(doc.status),
  };
  if (doc.start != null) task.start = doc.start;
  if (doc.end != null) task.end = doc.end;
  if (doc.duration != null) task.duration = doc.duration;
  if (doc.section != null) task.section = doc.section;
  if (doc.description != null) task.description = doc.description;
  if (doc.assignee != null) task.assignee = doc.assignee;
  return task;
}

function fromTask(task: Task): TaskDocument {
  return {
    id: task.id,
    name: task.name,
    dependencies: [...task.dependencies],
    ...(task.start !== undefined ? { start: task.start } : {}),
    ...(task.end !== undefined ? { end: task.end } : {}),
    ...(task.duration !== undefined ? { duration: task.duration } : {}),
    isMilestone: task.isMilestone,
    status: task.status.map(formatStatusTag),
    ...(task.section !== undefined ? { section: task.section } : {}),
    ...(task.description !== undefined ? { description: task.description } : {}),
    ...(task.assignee !== undefined ? { assignee: task.assignee } : {}),
  };
}
