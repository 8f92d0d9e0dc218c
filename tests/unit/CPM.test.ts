/**
 * @fileoverview Unit tests for CPM (Critical Path Method)
 * @module tests/unit/CPM.test
 *
 * Tests cover:
 * - Forward pass (Early Start)
 * - Backward pass (Late Start)
 * - Float calculations (Total Float = LS - ES)
 * - Critical path identification
 * - Milestones inside a chain
 * - Circular dependency detection
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { CPM } from '../../src/core/CPM';
import { Scheduler } from '../../src/core/Scheduler';
import { CycleDetectedError } from '../../src/core/errors';
import type { ProjectPlan } from '../../src/types';
import { makeCyclePlan, makeLaunchPlan, makePlan, makeTask } from '../helpers/planFactory';

/**
 * A(5d) -> B(5d), A -> C(2d), (B, C) -> D(1d); C has 3 days of float
 */
function makeBranchPlan(): ProjectPlan {
    return Scheduler.schedule(makePlan([
        makeTask('A', { start: '2024-01-01', duration: 5 }),
        makeTask('B', { dependencies: ['A'], duration: 5 }),
        makeTask('C', { dependencies: ['A'], duration: 2 }),
        makeTask('D', { dependencies: ['B', 'C'], duration: 1 }),
    ]));
}

describe('CPM', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    describe('Basic functionality', () => {
        it('should return an empty result for an empty plan', () => {
            const result = CPM.analyze(makePlan([]));
            expect(result.timings.size).toBe(0);
            expect(result.criticalTasks).toEqual([]);
        });

        it('should treat a single task as critical', () => {
            const plan = Scheduler.schedule(makePlan([makeTask('A', { start: '2024-01-01', duration: 3 })]));
            const timing = CPM.analyze(plan).timings.get('A');

            expect(timing).toEqual({
                id: 'A',
                earlyStart: '2024-01-01',
                lateStart: '2024-01-01',
                totalFloat: 0,
                isCritical: true,
            });
        });
    });

    describe('Forward and backward pass', () => {
        it('should put a plain chain entirely on the critical path', () => {
            const plan = Scheduler.schedule(makeLaunchPlan());
            const { timings, criticalTasks } = CPM.analyze(plan);

            expect(criticalTasks.map(t => t.id)).toEqual(['A', 'B', 'M']);
            expect(timings.get('B')).toMatchObject({ earlyStart: '2024-01-08', lateStart: '2024-01-08', totalFloat: 0 });
            expect(timings.get('M')).toMatchObject({ earlyStart: '2024-01-11', lateStart: '2024-01-11' });
        });

        it('should give the shorter branch float', () => {
            const { timings, criticalTasks } = CPM.analyze(makeBranchPlan());

            expect(timings.get('C')).toEqual({
                id: 'C',
                earlyStart: '2024-01-08',
                lateStart: '2024-01-11',
                totalFloat: 3,
                isCritical: false,
            });
            expect(criticalTasks.map(t => t.id)).toEqual(['A', 'B', 'D']);
        });

        it('should list timings in topological order', () => {
            const plan = Scheduler.schedule(makePlan([
                makeTask('B', { dependencies: ['A'], duration: 1 }),
                makeTask('A', { start: '2024-01-01', duration: 1 }),
            ]));
            expect([...CPM.analyze(plan).timings.keys()]).toEqual(['A', 'B']);
        });

        it('should give a mid-chain milestone and its predecessors one day of float', () => {
            // Backward pass subtracts the milestone's zero duration while its successor
            // starts the day after it
            const plan = Scheduler.schedule(makePlan([
                makeTask('A', { start: '2024-01-01', duration: 1 }),
                makeTask('M', { dependencies: ['A'], isMilestone: true }),
                makeTask('B', { dependencies: ['M'], duration: 1 }),
            ]));
            const { timings, criticalTasks } = CPM.analyze(plan);

            expect(timings.get('M')).toMatchObject({ earlyStart: '2024-01-02', lateStart: '2024-01-03', totalFloat: 1 });
            expect(timings.get('A')).toMatchObject({ earlyStart: '2024-01-01', lateStart: '2024-01-02', totalFloat: 1 });
            expect(criticalTasks.map(t => t.id)).toEqual(['B']);
        });

        it('should report negative float for a task starting on a non-working day', () => {
            const plan = Scheduler.schedule(makePlan([
                makeTask('A', { start: '2024-01-06', duration: 1 }),
                makeTask('B', { dependencies: ['A'], duration: 1 }),
            ]));
            const { timings } = CPM.analyze(plan);

            expect(timings.get('A')).toEqual({
                id: 'A',
                earlyStart: '2024-01-06',
                lateStart: '2024-01-05',
                totalFloat: -1,
                isCritical: false,
            });
            expect(timings.get('B')).toMatchObject({ totalFloat: 0, isCritical: true });
        });

        it('should leave timings null for tasks that were never dated', () => {
            const plan = makePlan([
                makeTask('A'),
                makeTask('B', { dependencies: ['A'] }),
            ]);
            const { timings, criticalTasks } = CPM.analyze(plan);

            expect(timings.get('A')).toEqual({
                id: 'A',
                earlyStart: null,
                lateStart: null,
                totalFloat: null,
                isCritical: false,
            });
            expect(criticalTasks).toEqual([]);
        });
    });

    describe('getCriticalPath', () => {
        it('should return the zero-float tasks', () => {
            expect(CPM.getCriticalPath(makeBranchPlan()).map(t => t.id)).toEqual(['A', 'B', 'D']);
        });
    });

    describe('markCritical', () => {
        it('should tag critical tasks and untag the rest', () => {
            const plan = makeBranchPlan();
            const c = plan.tasks.find(t => t.id === 'C');
            if (c) c.status = [{ kind: 'critical' }, { kind: 'active' }];

            const marked = CPM.markCritical(plan);

            expect(marked.tasks.map(t => t.status)).toEqual([
                [{ kind: 'critical' }],
                [{ kind: 'critical' }],
                [{ kind: 'active' }],
                [{ kind: 'critical' }],
            ]);
            expect(plan.tasks[0].status).toEqual([]);
        });

        it('should not duplicate an existing critical tag', () => {
            const plan = Scheduler.schedule(makePlan([
                makeTask('A', { start: '2024-01-01', duration: 1, status: [{ kind: 'done' }, { kind: 'critical' }] }),
            ]));
            expect(CPM.markCritical(plan).tasks[0].status).toEqual([{ kind: 'done' }, { kind: 'critical' }]);
        });
    });

    describe('Circular dependencies', () => {
        it('should throw CycleDetectedError', () => {
            expect(() => CPM.analyze(makeCyclePlan())).toThrow(CycleDetectedError);
        });
    });

    describe('Logging', () => {
        it('should log a summary when verbose', () => {
            const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
            CPM.analyze(makeBranchPlan(), { verbose: true });
            expect(log).toHaveBeenCalledWith('[CPM] 3 of 4 tasks on the critical path');
        });
    });
});
