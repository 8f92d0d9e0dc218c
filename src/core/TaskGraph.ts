/**
 * @fileoverview Task dependency graph
 * @module core/TaskGraph
 *
 * Ephemeral index built once per scheduling run. Never persisted and never
 * reused after the plan's task list changes.
 *
 * If Task B depends on Task A, then A is in dependencies(B) and B is in
 * dependents(A).
 */

import type { ProjectPlan, Task } from '../types';
import { CycleDetectedError } from './errors';

/**
 * Indexes over a plan's task list
 */
export interface TaskGraphIndex {
    /** Task lookup by ID */
    taskMap: Map<string, Task>;
    /** Task ID -> IDs it depends on */
    dependencies: Map<string, Set<string>>;
    /** Task ID -> IDs that depend on it */
    dependents: Map<string, Set<string>>;
    /** Task ID -> number of unresolved dependencies */
    inDegree: Map<string, number>;
}

/**
 * Result of a Kahn in-degree drain
 */
export interface DrainResult {
    /** Task IDs in topological order */
    order: string[];
    /** Task IDs that could not be visited (in or behind a cycle) */
    unresolved: string[];
}

/**
 * TaskGraph
 * Static helpers for building and walking the dependency graph
 */
export class TaskGraph {

    /**
     * Build the dependency indexes for a plan
     *
     * Does not mutate the plan. Assumes IDs are unique and dependencies
     * resolvable; a dangling dependency keeps its task's in-degree above
     * zero, so the task surfaces as unresolved.
     */
    static build(plan: ProjectPlan): TaskGraphIndex {
        const taskMap = new Map<string, Task>();
        const dependencies = new Map<string, Set<string>>();
        const dependents = new Map<string, Set<string>>();
        const inDegree = new Map<string, number>();

        for (const task of plan.tasks) {
            taskMap.set(task.id, task);
            const deps = new Set(task.dependencies);
            dependencies.set(task.id, deps);
            dependents.set(task.id, new Set());
            inDegree.set(task.id, deps.size);
        }

        for (const [taskId, deps] of dependencies) {
            for (const depId of deps) {
                dependents.get(depId)?.add(taskId);
            }
        }

        return { taskMap, dependencies, dependents, inDegree };
    }

    /**
     * Kahn's algorithm without any date work
     *
     * Seeds with every zero in-degree task in plan order, then releases
     * dependents FIFO. The graph's own in-degree map is left untouched.
     */
    static drain(graph: TaskGraphIndex): DrainResult {
        const remaining = new Map(graph.inDegree);
        const queue: string[] = [];
        for (const [taskId, degree] of remaining) {
            if (degree === 0) queue.push(taskId);
        }

        const order: string[] = [];
        const visited = new Set<string>();

        for (let head = 0; head < queue.length; head++) {
            const taskId = queue[head];
            if (visited.has(taskId)) continue;
            visited.add(taskId);
            order.push(taskId);

            for (const dependentId of graph.dependents.get(taskId) ?? []) {
                const degree = (remaining.get(dependentId) ?? 0) - 1;
                remaining.set(dependentId, degree);
                if (degree === 0) queue.push(dependentId);
            }
        }

        const unresolved = [...graph.taskMap.keys()].filter(id => !visited.has(id));
        return { order, unresolved };
    }

    /**
     * Task IDs in topological order
     * @throws CycleDetectedError when some tasks cannot be ordered
     */
    static topologicalOrder(graph: TaskGraphIndex): string[] {
        const { order, unresolved } = TaskGraph.drain(graph);
        if (unresolved.length > 0) {
            throw new CycleDetectedError(unresolved);
        }
        return order;
    }

    /**
     * Tasks a given task depends on, in its declared order
     */
    static getDependencies(graph: TaskGraphIndex, taskId: string): Task[] {
        return TaskGraph._resolve(graph, graph.dependencies.get(taskId));
    }

    /**
     * Tasks that depend on a given task
     */
    static getDependents(graph: TaskGraphIndex, taskId: string): Task[] {
        return TaskGraph._resolve(graph, graph.dependents.get(taskId));
    }

    /**
     * Get all predecessor task IDs (transitive closure through dependencies)
     * Uses BFS to traverse dependency graph backward
     */
    static getAllPredecessors(plan: ProjectPlan, taskId: string): Set<string> {
        const byId = new Map(plan.tasks.map(task => [task.id, task]));
        const predecessors = new Set<string>();
        const visited = new Set<string>();
        const queue: string[] = [taskId];

        while (queue.length > 0) {
            const currentId = queue.shift();
            if (currentId === undefined || visited.has(currentId)) continue;
            visited.add(currentId);

            for (const depId of byId.get(currentId)?.dependencies ?? []) {
                if (!visited.has(depId)) {
                    predecessors.add(depId);
                    queue.push(depId);
                }
            }
        }

        return predecessors;
    }

    /**
     * Check if making `taskId` depend on `predecessorId` would create a cycle
     */
    static wouldCreateCycle(plan: ProjectPlan, taskId: string, predecessorId: string): boolean {
        if (taskId === predecessorId) return true;
        // A cycle exists if the predecessor depends (directly or transitively) on the task
        return TaskGraph.getAllPredecessors(plan, predecessorId).has(taskId);
    }

    private static _resolve(graph: TaskGraphIndex, ids: Set<string> | undefined): Task[] {
        const tasks: Task[] = [];
        for (const id of ids ?? []) {
            const task = graph.taskMap.get(id);
            if (task) tasks.push(task);
        }
        return tasks;
    }
}

export default TaskGraph;
