// =============================================================================
// CORE TYPES - Plan Scheduler
// =============================================================================

/**
 * Calendar date in ISO format (YYYY-MM-DD)
 */
export type ISODate = string;

/**
 * Recognized status tags
 * - done: Task is complete
 * - active: Task is in progress
 * - critical: Task is flagged as lying on the critical path
 * - custom: Any other label, kept verbatim for display
 */
export type StatusTag =
  | { kind: 'done' }
  | { kind: 'active' }
  | { kind: 'critical' }
  | { kind: 'custom'; label: string };

export type StatusKind = StatusTag['kind'];

/**
 * Task in a project plan
 */
export interface Task {
  /** Unique identifier within the plan */
  id: string;
  /** Display name */
  name: string;
  /** IDs of tasks that must finish before this one starts */
  dependencies: string[];
  /** Start date */
  start?: ISODate;
  /** End date (inclusive) */
  end?: ISODate;
  /** Duration in working days (0 = milestone-equivalent) */
  duration?: number;
  /** Marker event: duration 0, start equals end once scheduled */
  isMilestone: boolean;
  /** Reporting labels, not used for scheduling */
  status: StatusTag[];
  /** Grouping label */
  section?: string;
  description?: string;
  assignee?: string;
}

/**
 * Project plan: ordered tasks plus the shared working-day calendar
 */
export interface ProjectPlan {
  title: string;
  description?: string;
  /** Earliest task start; also the fallback start for undated tasks */
  start?: ISODate;
  /** Latest task end */
  end?: ISODate;
  /** Tasks in insertion order */
  tasks: Task[];
  /** Working days (0=Sunday, 1=Monday, ..., 6=Saturday) */
  workingDays: number[];
  version: string;
}

/**
 * Scheduler options
 */
export interface ScheduleOptions {
  /** Clock used when neither the task nor the plan supplies a start date */
  today?: () => ISODate;
  /** Fail instead of falling back to today when the plan has no start date */
  requirePlanStart?: boolean;
  /** Log run summaries */
  verbose?: boolean;
}

/**
 * CPM timing for a single task
 */
export interface TaskTiming {
  id: string;
  /** Earliest start (forward pass) */
  earlyStart: ISODate | null;
  /** Latest start without delaying the project (backward pass) */
  lateStart: ISODate | null;
  /** Late start minus early start, in working days; negative when LS precedes ES, 0 only when critical */
  totalFloat: number | null;
  isCritical: boolean;
}

/**
 * Critical path analysis result
 */
export interface CPMResult {
  /** Timings keyed by task ID, in topological order */
  timings: Map<string, TaskTiming>;
  /** Zero-float tasks in topological order */
  criticalTasks: Task[];
}

/**
 * Validation diagnostic codes
 */
export type DiagnosticCode =
  | 'EMPTY_PLAN'
  | 'MISSING_TIME_INFO'
  | 'START_AFTER_END'
  | 'CIRCULAR_DEPENDENCY';

/**
 * Non-fatal validation finding
 */
export interface Diagnostic {
  code: DiagnosticCode;
  message: string;
  /** Task the finding refers to, if any */
  taskId?: string;
}

/**
 * Aggregate figures for a scheduled plan
 */
export interface ScheduleStatistics {
  totalTasks: number;
  completedTasks: number;
  activeTasks: number;
  milestoneCount: number;
  /** Inclusive working-day count from plan start to end, plus one (0 when unscheduled) */
  totalDuration: number;
  startDate: ISODate | null;
  endDate: ISODate | null;
  /** Percentage of tasks marked done (0-100) */
  completionRate: number;
  criticalPathLength: number;
  /** Distinct section labels, sorted */
  sections: string[];
}
