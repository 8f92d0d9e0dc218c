/**
 * @fileoverview Unit tests for StatsService
 * @module tests/unit/StatsService.test
 */

import { describe, it, expect } from 'vitest';
import { StatsService } from '../../src/services/StatsService';
import { Scheduler } from '../../src/core/Scheduler';
import { makeLaunchPlan, makePlan, makeTask } from '../helpers/planFactory';

describe('StatsService', () => {
    it('should compute figures for a scheduled plan', () => {
        const source = makeLaunchPlan();
        source.tasks[0].status = [{ kind: 'done' }];
        source.tasks[0].section = 'Build';
        source.tasks[1].status = [{ kind: 'active' }, { kind: 'custom', label: 'blocked' }];
        source.tasks[2].section = 'Release';

        const stats = StatsService.compute(Scheduler.schedule(source));

        expect(stats).toEqual({
            totalTasks: 3,
            completedTasks: 1,
            activeTasks: 1,
            milestoneCount: 1,
            totalDuration: 10,
            startDate: '2024-01-01',
            endDate: '2024-01-11',
            completionRate: expect.closeTo(33.33, 2),
            criticalPathLength: 3,
            sections: ['Build', 'Release'],
        });
    });

    it('should add one to the working-day span', () => {
        const plan = Scheduler.schedule(makePlan([makeTask('A', { start: '2024-01-03', duration: 1 })]));
        expect(StatsService.compute(plan).totalDuration).toBe(2);
    });

    it('should use a precomputed critical path', () => {
        const plan = Scheduler.schedule(makeLaunchPlan());
        const stats = StatsService.compute(plan, { criticalPath: [plan.tasks[2]] });
        expect(stats.criticalPathLength).toBe(1);
    });

    it('should report zero duration for an unscheduled plan', () => {
        const stats = StatsService.compute(makePlan([makeTask('A', { duration: 2 })]));

        expect(stats.totalDuration).toBe(0);
        expect(stats.startDate).toBeNull();
        expect(stats.endDate).toBeNull();
        expect(stats.criticalPathLength).toBe(0);
    });

    it('should handle an empty plan', () => {
        expect(StatsService.compute(makePlan([]))).toEqual({
            totalTasks: 0,
            completedTasks: 0,
            activeTasks: 0,
            milestoneCount: 0,
            totalDuration: 0,
            startDate: null,
            endDate: null,
            completionRate: 0,
            criticalPathLength: 0,
            sections: [],
        });
    });

    it('should count every task done as 100 percent', () => {
        const plan = makePlan([
            makeTask('A', { duration: 1, status: [{ kind: 'done' }] }),
            makeTask('B', { duration: 1, status: [{ kind: 'done' }] }),
        ], { start: '2024-01-01' });

        expect(StatsService.compute(Scheduler.schedule(plan)).completionRate).toBe(100);
    });
});
