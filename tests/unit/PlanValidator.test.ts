/**
 * @fileoverview Unit tests for PlanValidator
 * @module tests/unit/PlanValidator.test
 */

import { describe, it, expect } from 'vitest';
import { PlanValidator } from '../../src/services/PlanValidator';
import { makeCyclePlan, makeLaunchPlan, makePlan, makeTask } from '../helpers/planFactory';

describe('PlanValidator', () => {
    it('should return no diagnostics for a well-formed plan', () => {
        expect(PlanValidator.validate(makeLaunchPlan())).toEqual([]);
    });

    it('should report an empty plan and stop', () => {
        expect(PlanValidator.validate(makePlan([]))).toEqual([
            { code: 'EMPTY_PLAN', message: 'Project plan contains no tasks' },
        ]);
    });

    it('should report a task with nothing to date it from', () => {
        const plan = makePlan([
            makeTask('A', { name: 'Design' }),
            makeTask('B', { duration: 2 }),
            makeTask('C', { dependencies: ['B'] }),
        ]);

        expect(PlanValidator.validate(plan)).toEqual([
            {
                code: 'MISSING_TIME_INFO',
                message: "Task 'Design' (A) is missing basic time information",
                taskId: 'A',
            },
        ]);
    });

    it('should report a start after the end', () => {
        const plan = makePlan([makeTask('A', { start: '2024-01-10', end: '2024-01-02' })]);

        expect(PlanValidator.validate(plan)).toEqual([
            {
                code: 'START_AFTER_END',
                message: "Task 'Task A' (A) starts after it ends",
                taskId: 'A',
            },
        ]);
    });

    it('should accept a task that starts and ends on the same day', () => {
        const plan = makePlan([makeTask('A', { start: '2024-01-10', end: '2024-01-10' })]);
        expect(PlanValidator.validate(plan)).toEqual([]);
    });

    it('should report a cycle once without a task id', () => {
        const diagnostics = PlanValidator.validate(makeCyclePlan(['B', 'C', 'A']));

        expect(diagnostics).toEqual([
            {
                code: 'CIRCULAR_DEPENDENCY',
                message: 'Circular dependency detected among tasks: A, B, C',
            },
        ]);
    });

    it('should list per-task findings before the cycle', () => {
        const plan = makeCyclePlan();
        plan.tasks.push(makeTask('D'));

        expect(PlanValidator.validate(plan).map(d => d.code)).toEqual(['MISSING_TIME_INFO', 'CIRCULAR_DEPENDENCY']);
    });

    it('should not mutate the plan', () => {
        const plan = makeLaunchPlan();
        const before = structuredClone(plan);
        PlanValidator.validate(plan);
        expect(plan).toEqual(before);
    });
});
