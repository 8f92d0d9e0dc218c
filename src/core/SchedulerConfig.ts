/**
 * @fileoverview Scheduler configuration
 * @module core/SchedulerConfig
 *
 * Defaults, overridable from the environment, overridable again by the caller.
 *
 * Environment:
 *   SCHEDULER_WORKING_DAYS        comma-separated weekday indices, e.g. "1,2,3,4,5"
 *   SCHEDULER_REQUIRE_PLAN_START  "true" / "false"
 *   SCHEDULER_VERBOSE             "true" / "false"
 */

import { DEFAULT_WORKING_DAYS, isValidWeekday } from './Constants';

/**
 * Configuration values
 */
export interface SchedulerConfigValues {
    /** Working days for plans that do not carry their own */
    workingDays: number[];
    /** Fail instead of falling back to today's date for undated tasks */
    requirePlanStart: boolean;
    /** Log run summaries */
    verbose: boolean;
}

/**
 * Default values
 */
export const DEFAULT_SCHEDULER_CONFIG: Readonly<SchedulerConfigValues> = Object.freeze({
    workingDays: [...DEFAULT_WORKING_DAYS],
    requirePlanStart: false,
    verbose: false,
});

type Env = Record<string, string | undefined>;

/**
 * Merge explicit overrides over environment values over defaults
 *
 * @param overrides - Values supplied by the caller
 * @param env - Environment to read (defaults to process.env)
 */
export function resolveSchedulerConfig(
    overrides: Partial<SchedulerConfigValues> = {},
    env: Env = process.env
): SchedulerConfigValues {
    const fromEnv: Partial<SchedulerConfigValues> = {};

    const workingDays = parseWorkingDays(env.SCHEDULER_WORKING_DAYS);
    if (workingDays) fromEnv.workingDays = workingDays;

    const requirePlanStart = parseBoolean('SCHEDULER_REQUIRE_PLAN_START', env.SCHEDULER_REQUIRE_PLAN_START);
    if (requirePlanStart !== undefined) fromEnv.requirePlanStart = requirePlanStart;

    const verbose = parseBoolean('SCHEDULER_VERBOSE', env.SCHEDULER_VERBOSE);
    if (verbose !== undefined) fromEnv.verbose = verbose;

    const merged = { ...DEFAULT_SCHEDULER_CONFIG, ...fromEnv, ...overrides };
    return { ...merged, workingDays: [...merged.workingDays] };
}

function parseWorkingDays(raw: string | undefined): number[] | undefined {
    if (raw === undefined || raw.trim() === '') return undefined;

    const days = raw.split(',').map(part => Number(part.trim()));
    if (!days.every(isValidWeekday)) {
        console.warn(`[SchedulerConfig] Ignoring SCHEDULER_WORKING_DAYS="${raw}"`);
        return undefined;
    }
    return [...new Set(days)].sort((a, b) => a - b);
}

function parseBoolean(name: string, raw: string | undefined): boolean | undefined {
    if (raw === undefined || raw.trim() === '') return undefined;

    const value = raw.trim().toLowerCase();
    if (value === 'true' || value === '1') return true;
    if (value === 'false' || value === '0') return false;

    console.warn(`[SchedulerConfig] Ignoring ${name}="${raw}"`);
    return undefined;
}
