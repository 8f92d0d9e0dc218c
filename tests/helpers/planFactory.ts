/**
 * @fileoverview Plan and task builders for tests
 * @module tests/helpers/planFactory
 */

import type { ProjectPlan, Task } from '../../src/types';

/** Monday-Friday */
export const WEEKDAYS = [1, 2, 3, 4, 5];

/** Fixed clock value for tasks that fall back to "today" */
export const FIXED_TODAY = '2024-03-04';

export const fixedClock = (): string => FIXED_TODAY;

export function makeTask(id: string, overrides: Partial<Task> = {}): Task {
  return {
    id,
    name: `Task ${id}`,
    dependencies: [],
    isMilestone: false,
    status: [],
    ...overrides,
  };
}

export function makePlan(tasks: Task[], overrides: Partial<ProjectPlan> = {}): ProjectPlan {
  return {
    title: 'Test Plan',
    tasks,
    workingDays: [...WEEKDAYS],
    version: '1.0',
    ...overrides,
  };
}

/**
 * A(start 2024-01-01, 5d) -> B(3d) -> M(milestone)
 */
export function makeLaunchPlan(): ProjectPlan {
  return makePlan([
    makeTask('A', { start: '2024-01-01', duration: 5 }),
    makeTask('B', { dependencies: ['A'], duration: 3 }),
    makeTask('M', { dependencies: ['B'], isMilestone: true }),
  ]);
}

/**
 * Linear chain T1 -> T2 -> ... -> Tn, each `duration` working days
 */
export function makeChainPlan(count: number, start: string, duration: number = 1): ProjectPlan {
  const tasks: Task[] = [];
  for (let i = 1; i <= count; i++) {
    tasks.push(makeTask(`T${i}`, {
      duration,
      dependencies: i > 1 ? [`T${i - 1}`] : [],
      ...(i === 1 ? { start } : {}),
    }));
  }
  return makePlan(tasks);
}

/**
 * A depends on C, B on A, C on B
 */
export function makeCyclePlan(order: Array<'A' | 'B' | 'C'> = ['A', 'B', 'C']): ProjectPlan {
  const deps = { A: 'C', B: 'A', C: 'B' } as const;
  return makePlan(order.map(id => makeTask(id, { duration: 2, dependencies: [deps[id]] })));
}
