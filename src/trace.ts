/**
 * Pipeline structure utilities
 *
 * Extract execution context from a pipeline's task graph for debugging.
 */

import type { Task } from './core.js';
import type { Pipeline } from './pipeline.js';

/**
 * Get execution path of a pipeline
 *
 * Returns task labels in the order run() executes them.
 * Shared dependencies appear only once.
 *
 * @example
 * const path = getTrace(pipeline);
 * // ['load', 'filter', 'tabulate', 'extract', ...]
 */
export function getTrace(pipeline: Pipeline): string[] {
  const visited = new Set<symbol>();
  const path: string[] = [];

  function traverse(t: Task<unknown>) {
    if (visited.has(t._id)) return;
    visited.add(t._id);

    // Dependencies first, in declared order
    for (const dep of t.deps) {
      traverse(dep);
    }

    path.push(t.label);
  }

  for (const task of pipeline.tasks()) {
    traverse(task);
  }
  return path;
}

/**
 * Get graph structure for visualization
 *
 * Returns array of edges [dependency, dependent].
 *
 * @example
 * const edges = getEdges(pipeline);
 * // [['load', 'filter'], ['filter', 'tabulate'], ...]
 */
export function getEdges(pipeline: Pipeline): Array<[string, string]> {
  const edges: Array<[string, string]> = [];

  for (const task of pipeline.tasks()) {
    for (const dep of task.deps) {
      edges.push([dep.label, task.label]);
    }
  }
  return edges;
}
