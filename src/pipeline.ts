/**
 * Pipeline - registry of tasks plus the entry points that run them
 */

import type { PipelineEvent, Result, Task, UnwrapTasks } from './core.js';
import { ConfigurationError } from './errors.js';
import type { ResultTable } from './result-table.js';
import { execute } from './run.js';
import type { Registration } from './run.js';

export interface PipelineOptions {
  /** Receives run and task lifecycle events, synchronously */
  readonly onEvent?: (event: PipelineEvent) => void;
}

export interface Pipeline {
  /**
   * Register a computation that consumes the values of `deps`, in order.
   * Nothing executes until run().
   *
   * @throws ConfigurationError if a dependency was not registered on this
   *   pipeline or the label is already taken; nothing is registered then
   */
  register<T, const TDeps extends readonly Task<unknown>[]>(
    label: string,
    deps: TDeps,
    compute: (...values: UnwrapTasks<TDeps>) => T
  ): Task<T>;

  /** Registered tasks, in registration order */
  tasks(): readonly Task<unknown>[];

  /**
   * Execute every task once, dependencies first, and return their values.
   * A computation that throws aborts the run; the error is rethrown as is.
   */
  run(): ResultTable;

  /** Same as run(), but failures come back as an Err naming the task */
  tryRun(): Result<ResultTable, unknown>;
}

/**
 * Create an empty pipeline
 *
 * @example
 * const pipeline = createPipeline();
 * const a = pipeline.register('a', [], () => 5);
 * const b = pipeline.register('b', [a], (x) => x + 1);
 *
 * const results = pipeline.run();
 * results.get(b); // 6
 */
export function createPipeline(options: PipelineOptions = {}): Pipeline {
  const registrations: Registration[] = [];
  const byId = new Map<symbol, Registration>();
  const labels = new Set<string>();
  const emit = options.onEvent ?? (() => {});

  function resolve(dep: Task<unknown>, label: string): Registration {
    const reg = byId.get(dep._id);
    if (!reg) {
      throw new ConfigurationError(
        `Task '${label}' depends on '${dep.label}', which is not registered on this pipeline`
      );
    }
    return reg;
  }

  return {
    register<T, const TDeps extends readonly Task<unknown>[]>(
      label: string,
      deps: TDeps,
      compute: (...values: UnwrapTasks<TDeps>) => T
    ): Task<T> {
      if (labels.has(label)) {
        throw new ConfigurationError(`Task '${label}' is already registered`);
      }
      const resolved = deps.map((dep) => resolve(dep, label));

      const task: Task<T> = { label, deps: [...deps], _id: Symbol(label) };
      const reg: Registration = {
        task,
        deps: resolved,
        // Values arrive in the same order as deps
        invoke: (values) => compute(...(values as UnwrapTasks<TDeps>))
      };

      registrations.push(reg);
      byId.set(task._id, reg);
      labels.add(label);
      return task;
    },

    tasks() {
      return registrations.map((reg) => reg.task);
    },

    run() {
      const result = execute(registrations, emit);
      if (!result.ok) {
        throw result.error;
      }
      return result.value;
    },

    tryRun() {
      return execute(registrations, emit);
    }
  };
}
