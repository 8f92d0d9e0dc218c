/**
 * @fileoverview Application-wide constants
 * @module core/Constants
 */

import type { StatusKind } from '../types';

/**
 * Default working days (Monday-Friday)
 */
export const DEFAULT_WORKING_DAYS: readonly number[] = Object.freeze([1, 2, 3, 4, 5]);

/**
 * Default plan title when a document omits one
 */
export const DEFAULT_PLAN_TITLE = 'Project Plan';

/**
 * Default plan version
 */
export const DEFAULT_PLAN_VERSION = '1.0';

/**
 * Free-form labels mapped onto recognized status kinds (lower-case)
 */
export const STATUS_LABEL_ALIASES: Readonly<Record<string, Exclude<StatusKind, 'custom'>>> = Object.freeze({
  'done': 'done',
  'active': 'active',
  'crit': 'critical',
  'critical': 'critical',
});

/**
 * Label written back out for each recognized status kind
 */
export const STATUS_LABELS: Readonly<Record<Exclude<StatusKind, 'custom'>, string>> = Object.freeze({
  'done': 'done',
  'active': 'active',
  'critical': 'crit',
} as const);

/**
 * Validate if a value is a weekday index (0=Sunday ... 6=Saturday)
 * @param day - Value to validate
 * @returns True if valid
 */
export function isValidWeekday(day: number): boolean {
  return Number.isInteger(day) && day >= 0 && day <= 6;
}
