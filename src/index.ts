/**
 * @fileoverview Public API
 * @module index
 */

export type {
    CPMResult,
    Diagnostic,
    DiagnosticCode,
    ISODate,
    ProjectPlan,
    ScheduleOptions,
    ScheduleStatistics,
    StatusKind,
    StatusTag,
    Task,
    TaskTiming,
} from './types';

export {
    DateUtils,
    isWorkDay,
    addWorkingDays,
    subtractWorkingDays,
    countWorkingDays,
    calcWorkDaysDifference,
} from './core/DateUtils';
export { TaskGraph } from './core/TaskGraph';
export type { TaskGraphIndex, DrainResult } from './core/TaskGraph';
export { DateDeriver } from './core/DateDeriver';
export { Scheduler } from './core/Scheduler';
export { CPM } from './core/CPM';
export type { CPMOptions } from './core/CPM';
export { CycleDetectedError, MissingPlanStartError, PlanValidationError } from './core/errors';
export { parseStatusTag, parseStatusTags, formatStatusTag, hasStatus } from './core/StatusTags';
export { DEFAULT_SCHEDULER_CONFIG, resolveSchedulerConfig } from './core/SchedulerConfig';
export type { SchedulerConfigValues } from './core/SchedulerConfig';
export { DEFAULT_WORKING_DAYS } from './core/Constants';

export { PlanValidator } from './services/PlanValidator';
export { StatsService } from './services/StatsService';
export type { StatsOptions } from './services/StatsService';
export { ScheduleController } from './services/ScheduleController';
export type { ScheduleControllerOptions, ScheduleOutcome, TaskChanges } from './services/ScheduleController';

export { parsePlan, serializePlan, planDocumentSchema, taskDocumentSchema } from './data/PlanSchema';
export type { PlanDocument, TaskDocument } from './data/PlanSchema';
export * from './data/PlanQueries';
