/**
 * @fileoverview Scheduling error types
 * @module core/errors
 */

/**
 * Raised when the topological pass cannot visit every task.
 * Dates computed during the failed run must be discarded.
 */
export class CycleDetectedError extends Error {
    /** Unprocessed task IDs, sorted */
    readonly taskIds: string[];

    constructor(taskIds: Iterable<string>) {
        const ids = [...taskIds].sort();
        super(`Circular dependency detected among tasks: ${ids.join(', ')}`);
        this.name = 'CycleDetectedError';
        this.taskIds = ids;
    }
}

/**
 * Raised in strict mode when an undated task has no plan start to fall back on
 */
export class MissingPlanStartError extends Error {
    readonly taskId: string;

    constructor(taskId: string) {
        super(`Task ${taskId} has no start date and the plan defines none`);
        this.name = 'MissingPlanStartError';
        this.taskId = taskId;
    }
}

/**
 * Raised by the plan boundary when a document breaks structural invariants
 */
export class PlanValidationError extends Error {
    readonly issues: string[];

    constructor(issues: string[]) {
        super(`Invalid project plan:\n- ${issues.join('\n- ')}`);
        this.name = 'PlanValidationError';
        this.issues = issues;
    }
}
