/**
 * Task execution runtime
 *
 * Executes a pipeline's registered tasks in dependency order,
 * one at a time, with per-run memoization.
 */

import { err, ok } from './core.js';
import type { PipelineEvent, Result, Task } from './core.js';
import { ResultTable } from './result-table.js';

/**
 * Internal: a task handle bound to its computation and resolved dependencies
 */
export interface Registration {
  readonly task: Task<unknown>;
  readonly deps: readonly Registration[];
  readonly invoke: (values: readonly unknown[]) => unknown;
}

/**
 * Execute every registration exactly once
 *
 * - Registration order drives the walk; dependencies run first
 * - Each task executes at most once per call (memoized by handle)
 * - Short-circuits on the first thrown error
 */
export function execute(
  registrations: readonly Registration[],
  emit: (event: PipelineEvent) => void
): Result<ResultTable, unknown> {
  const values = new Map<symbol, unknown>();
  const order: Task<unknown>[] = [];

  function visit(reg: Registration): Result<unknown, unknown> {
    // Memoized: already produced in this run
    if (values.has(reg.task._id)) {
      return ok(values.get(reg.task._id));
    }

    const depValues: unknown[] = [];
    for (const dep of reg.deps) {
      const depResult = visit(dep);
      if (!depResult.ok) return depResult;
      depValues.push(depResult.value);
    }

    emit({ kind: 'task:start', label: reg.task.label });
    let value: unknown;
    try {
      value = reg.invoke(depValues);
    } catch (error) {
      emit({ kind: 'task:error', label: reg.task.label, error });
      return err(reg.task, error);
    }

    values.set(reg.task._id, value);
    order.push(reg.task);
    emit({ kind: 'task:done', label: reg.task.label });
    return ok(value);
  }

  emit({ kind: 'run:start', taskCount: registrations.length });
  for (const reg of registrations) {
    const result = visit(reg);
    if (!result.ok) return result;
  }
  emit({ kind: 'run:done', taskCount: registrations.length });

  return ok(new ResultTable(values, order));
}
