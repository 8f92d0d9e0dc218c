/**
 * @fileoverview Date utility functions for working day calculations
 * @module core/DateUtils
 *
 * Date utility functions for the scheduler engine.
 * Handles working day calculations over a fixed weekly pattern.
 *
 * All date operations respect the provided working-day set:
 * - workingDays: Array of day indices (0=Sunday, 1=Monday, etc.)
 *
 * Dates are ISO strings ("YYYY-MM-DD") and all arithmetic happens in UTC,
 * so results never depend on the host time zone.
 */

import type { ISODate } from '../types';
import { DEFAULT_WORKING_DAYS } from './Constants';

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * DateUtils class providing static methods for date calculations
 */
export class DateUtils {

    /**
     * Check if a date is a working day
     *
     * @param date - The date to check (Date or ISO string)
     * @param workingDays - Working weekday indices
     * @returns True if the date is a working day
     *
     * @example
     * DateUtils.isWorkDay("2024-01-01", [1,2,3,4,5]); // true (Monday)
     * DateUtils.isWorkDay("2024-01-07", [1,2,3,4,5]); // false (Sunday)
     */
    static isWorkDay(date: Date | ISODate, workingDays: readonly number[] = DEFAULT_WORKING_DAYS): boolean {
        const normalized = typeof date === 'string' ? DateUtils.parseDate(date) : date;
        return workingDays.includes(normalized.getUTCDay());
    }

    /**
     * Add working days to a date
     *
     * Steps one calendar day at a time; each working day landed on
     * counts towards `days`. Adding 0 returns the date unchanged, so a task
     * of duration d ends at addWorkingDays(start, d - 1).
     * Negative counts step backward.
     *
     * @param dateStr - Base date
     * @param days - Number of working days to add
     * @param workingDays - Working weekday indices
     * @returns Resulting date
     *
     * @example
     * // Friday + 1 working day = Monday
     * DateUtils.addWorkingDays("2024-01-05", 1); // "2024-01-08"
     */
    static addWorkingDays(dateStr: ISODate, days: number, workingDays: readonly number[] = DEFAULT_WORKING_DAYS): ISODate {
        if (days < 0) return DateUtils.subtractWorkingDays(dateStr, -days, workingDays);
        return DateUtils._step(dateStr, days, 1, workingDays);
    }

    /**
     * Subtract working days from a date (mirror of addWorkingDays)
     *
     * @param dateStr - Base date
     * @param days - Number of working days to step back
     * @param workingDays - Working weekday indices
     * @returns Resulting date
     *
     * @example
     * // Monday - 1 working day = Friday
     * DateUtils.subtractWorkingDays("2024-01-08", 1); // "2024-01-05"
     */
    static subtractWorkingDays(dateStr: ISODate, days: number, workingDays: readonly number[] = DEFAULT_WORKING_DAYS): ISODate {
        if (days < 0) return DateUtils.addWorkingDays(dateStr, -days, workingDays);
        return DateUtils._step(dateStr, days, -1, workingDays);
    }

    /**
     * Count working days between two dates (inclusive of both ends)
     *
     * @param startStr - Start date
     * @param endStr - End date
     * @param workingDays - Working weekday indices
     * @returns Number of working days, 0 when start is after end
     *
     * @example
     * // Monday to Friday = 5 working days
     * DateUtils.countWorkingDays("2024-01-01", "2024-01-05"); // 5
     */
    static countWorkingDays(startStr: ISODate, endStr: ISODate, workingDays: readonly number[] = DEFAULT_WORKING_DAYS): number {
        if (startStr > endStr) return 0;

        const current = DateUtils.parseDate(startStr);
        const end = DateUtils.parseDate(endStr);

        let count = 0;
        while (current <= end) {
            if (DateUtils.isWorkDay(current, workingDays)) {
                count++;
            }
            current.setUTCDate(current.getUTCDate() + 1);
        }

        return count;
    }

    /**
     * Calculate the signed difference in work days between two dates
     *
     * Unlike countWorkingDays which counts inclusive days, this method
     * returns a signed difference suitable for float calculations.
     *
     * @example
     * DateUtils.calcWorkDaysDifference("2024-01-01", "2024-01-03"); // 2
     * DateUtils.calcWorkDaysDifference("2024-01-03", "2024-01-01"); // -2
     */
    static calcWorkDaysDifference(startStr: ISODate, endStr: ISODate, workingDays: readonly number[] = DEFAULT_WORKING_DAYS): number {
        if (startStr === endStr) return 0;

        const start = DateUtils.parseDate(startStr);
        const end = DateUtils.parseDate(endStr);
        const current = new Date(start);
        let count = 0;

        if (end > start) {
            while (current < end) {
                current.setUTCDate(current.getUTCDate() + 1);
                if (DateUtils.isWorkDay(current, workingDays)) {
                    count++;
                }
            }
        } else {
            while (current > end) {
                if (DateUtils.isWorkDay(current, workingDays)) {
                    count--;
                }
                current.setUTCDate(current.getUTCDate() - 1);
            }
        }

        return count;
    }

    /**
     * Compare two ISO dates
     * @returns Negative if a < b, 0 if equal, positive if a > b
     */
    static compareDates(a: ISODate, b: ISODate): number {
        return a < b ? -1 : a > b ? 1 : 0;
    }

    /**
     * Latest of the given dates, or null for an empty list
     */
    static maxDate(dates: Iterable<ISODate>): ISODate | null {
        let latest: ISODate | null = null;
        for (const date of dates) {
            if (latest === null || date > latest) latest = date;
        }
        return latest;
    }

    /**
     * Earliest of the given dates, or null for an empty list
     */
    static minDate(dates: Iterable<ISODate>): ISODate | null {
        let earliest: ISODate | null = null;
        for (const date of dates) {
            if (earliest === null || date < earliest) earliest = date;
        }
        return earliest;
    }

    /**
     * Check that a string is a real calendar date in "YYYY-MM-DD" form
     */
    static isValidISODate(value: string): boolean {
        if (!ISO_DATE_PATTERN.test(value)) return false;
        const parsed = DateUtils.parseDate(value);
        return !Number.isNaN(parsed.getTime()) && DateUtils.formatDateISO(parsed) === value;
    }

    /**
     * Parse a date string to a Date object
     * Uses noon UTC so stepping by whole days never crosses a date boundary
     */
    static parseDate(dateStr: ISODate): Date {
        return new Date(dateStr + 'T12:00:00Z');
    }

    /**
     * Format a Date object to ISO date string (YYYY-MM-DD)
     */
    static formatDateISO(date: Date): ISODate {
        return date.toISOString().split('T')[0];
    }

    /**
     * Get today's date as an ISO string
     */
    static today(): ISODate {
        return DateUtils.formatDateISO(new Date());
    }

    private static _step(dateStr: ISODate, days: number, direction: 1 | -1, workingDays: readonly number[]): ISODate {
        if (days === 0) return dateStr;
        if (!workingDays.some(day => day >= 0 && day <= 6)) {
            throw new Error('[DateUtils] Calendar has no working days');
        }

        const date = DateUtils.parseDate(dateStr);
        let remaining = days;

        while (remaining > 0) {
            date.setUTCDate(date.getUTCDate() + direction);
            if (DateUtils.isWorkDay(date, workingDays)) {
                remaining--;
            }
        }

        return DateUtils.formatDateISO(date);
    }
}

// Also export individual functions for convenience
export const isWorkDay = DateUtils.isWorkDay;
export const addWorkingDays = DateUtils.addWorkingDays;
export const subtractWorkingDays = DateUtils.subtractWorkingDays;
export const countWorkingDays = DateUtils.countWorkingDays;
export const calcWorkDaysDifference = DateUtils.calcWorkDaysDifference;

export default DateUtils;
