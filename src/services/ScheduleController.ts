/**
 * ScheduleController
 *
 * Stateful façade over the pure scheduling modules.
 *
 * Responsibilities:
 * 1. Holding the unscheduled source plan the caller edits
 * 2. Running validate -> schedule -> critical path -> statistics
 * 3. Exposing results via RxJS Observables
 *
 * Every run starts from the source plan, never from a previous result,
 * so repeated edits cannot make dates drift.
 */

import { BehaviorSubject, Subject } from 'rxjs';
import type { Diagnostic, ISODate, ProjectPlan, ScheduleStatistics, Task } from '../types';
import { CPM } from '../core/CPM';
import { Scheduler } from '../core/Scheduler';
import { isValidWeekday } from '../core/Constants';
import { CycleDetectedError, MissingPlanStartError } from '../core/errors';
import { clonePlan, cloneTask } from '../core/PlanCopy';
import { resolveSchedulerConfig, type SchedulerConfigValues } from '../core/SchedulerConfig';
import { TaskGraph } from '../core/TaskGraph';
import { PlanValidator } from './PlanValidator';
import { StatsService } from './StatsService';

/**
 * Controller options
 */
export interface ScheduleControllerOptions {
    /** Overrides applied over environment and defaults */
    config?: Partial<SchedulerConfigValues>;
    /** Environment to read configuration from (defaults to process.env) */
    env?: Record<string, string | undefined>;
    /** Clock for tasks that fall back to today's date */
    today?: () => ISODate;
}

/**
 * Editable task fields
 */
export type TaskChanges = Partial<Omit<Task, 'id'>>;

/**
 * Result of a scheduling run
 */
export type ScheduleOutcome =
    | {
        ok: true;
        plan: ProjectPlan;
        diagnostics: Diagnostic[];
        criticalPath: Task[];
        stats: ScheduleStatistics;
    }
    | {
        ok: false;
        error: CycleDetectedError | MissingPlanStartError;
        diagnostics: Diagnostic[];
    };

export class ScheduleController {

    // ========================================================================
    // Observable State
    // ========================================================================

    /** Dated plan from the last successful run (null after a failed run) */
    public readonly plan$ = new BehaviorSubject<ProjectPlan | null>(null);

    /** Validator findings for the current source plan */
    public readonly diagnostics$ = new BehaviorSubject<Diagnostic[]>([]);

    /** Zero-float tasks of the dated plan */
    public readonly criticalPath$ = new BehaviorSubject<Task[]>([]);

    /** Statistics of the dated plan */
    public readonly stats$ = new BehaviorSubject<ScheduleStatistics | null>(null);

    /** Whether a run is in progress */
    public readonly isCalculating$ = new BehaviorSubject<boolean>(false);

    /** Error stream for failed runs */
    public readonly errors$ = new Subject<string>();

    private source: ProjectPlan | null = null;
    private readonly config: SchedulerConfigValues;
    private readonly today: (() => ISODate) | undefined;

    constructor(options: ScheduleControllerOptions = {}) {
        this.config = resolveSchedulerConfig(options.config, options.env);
        this.today = options.today;
    }

    /**
     * Replace the source plan and schedule it.
     * A plan without working days takes the configured ones.
     */
    load(plan: ProjectPlan): ScheduleOutcome {
        const source = clonePlan(plan);
        if (source.workingDays.length === 0) {
            source.workingDays = [...this.config.workingDays];
        }
        this._checkWorkingDays(source.workingDays);
        this.source = source;
        this._log(`Loaded "${source.title}" with ${source.tasks.length} tasks`);
        return this.recalculate();
    }

    /**
     * Apply changes to one task of the source plan and reschedule.
     * New dependencies must name other tasks of the plan and must not close a cycle;
     * a rejected edit leaves the source plan untouched.
     */
    updateTask(id: string, changes: TaskChanges): ScheduleOutcome {
        const source = this._requireSource();
        const index = source.tasks.findIndex(t => t.id === id);
        if (index === -1) {
            throw new Error(`[ScheduleController] Task ${id} not found`);
        }
        if (changes.dependencies !== undefined) {
            this._checkDependencies(source, id, changes.dependencies);
        }

        source.tasks[index] = cloneTask({ ...source.tasks[index], ...changes, id });
        return this.recalculate();
    }

    /**
     * Change the plan-wide working-day set and reschedule
     */
    setWorkingDays(workingDays: number[]): ScheduleOutcome {
        const source = this._requireSource();
        this._checkWorkingDays(workingDays);

        source.workingDays = [...new Set(workingDays)].sort((a, b) => a - b);
        return this.recalculate();
    }

    /**
     * Run validation, scheduling, critical path and statistics on the source plan
     */
    recalculate(): ScheduleOutcome {
        const source = this._requireSource();
        this.isCalculating$.next(true);

        const diagnostics = PlanValidator.validate(source);
        this.diagnostics$.next(diagnostics);

        try {
            const plan = Scheduler.schedule(source, {
                today: this.today,
                requirePlanStart: this.config.requirePlanStart,
                verbose: this.config.verbose,
            });
            const { criticalTasks } = CPM.analyze(plan, { verbose: this.config.verbose });
            const stats = StatsService.compute(plan, { criticalPath: criticalTasks });

            this.plan$.next(plan);
            this.criticalPath$.next(criticalTasks);
            this.stats$.next(stats);

            return { ok: true, plan, diagnostics, criticalPath: criticalTasks, stats };
        } catch (error) {
            if (error instanceof CycleDetectedError || error instanceof MissingPlanStartError) {
                console.error('[ScheduleController] Scheduling failed:', error.message);
                // Results of a failed run must not be consumed
                this.plan$.next(null);
                this.criticalPath$.next([]);
                this.stats$.next(null);
                this.errors$.next(error.message);
                return { ok: false, error, diagnostics };
            }
            throw error;
        } finally {
            this.isCalculating$.next(false);
        }
    }

    /**
     * Copy of the unscheduled source plan
     */
    getSourcePlan(): ProjectPlan | null {
        return this.source ? clonePlan(this.source) : null;
    }

    getConfig(): SchedulerConfigValues {
        return { ...this.config, workingDays: [...this.config.workingDays] };
    }

    /**
     * Complete all streams and drop the source plan
     */
    dispose(): void {
        this.source = null;
        this.plan$.complete();
        this.diagnostics$.complete();
        this.criticalPath$.complete();
        this.stats$.complete();
        this.isCalculating$.complete();
        this.errors$.complete();
        this._log('Disposed');
    }

    private _checkWorkingDays(workingDays: readonly number[]): void {
        if (workingDays.length === 0 || !workingDays.every(isValidWeekday)) {
            throw new Error(`[ScheduleController] Invalid working days: ${workingDays.join(', ')}`);
        }
    }

    private _checkDependencies(source: ProjectPlan, id: string, dependencies: readonly string[]): void {
        const known = new Set(source.tasks.map(t => t.id));
        for (const depId of dependencies) {
            if (depId === id) {
                throw new Error(`[ScheduleController] Task ${id} cannot depend on itself`);
            }
            if (!known.has(depId)) {
                throw new Error(`[ScheduleController] Task ${id} depends on unknown task ${depId}`);
            }
            if (TaskGraph.wouldCreateCycle(source, id, depId)) {
                throw new Error(`[ScheduleController] Task ${id} cannot depend on ${depId}: circular dependency`);
            }
        }
    }

    private _requireSource(): ProjectPlan {
        if (!this.source) {
            throw new Error('[ScheduleController] No plan loaded');
        }
        return this.source;
    }

    private _log(message: string): void {
        if (this.config.verbose) {
            console.log(`[ScheduleController] ${message}`);
        }
    }
}

export default ScheduleController;
