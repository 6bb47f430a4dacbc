import type { Task } from './core.js';

/**
 * Values produced by one pipeline run, keyed by task handle.
 *
 * Built once the whole run has succeeded; entries never change afterwards.
 */
export class ResultTable {
  readonly #values: ReadonlyMap<symbol, unknown>;
  readonly #order: readonly Task<unknown>[];

  constructor(values: ReadonlyMap<symbol, unknown>, order: readonly Task<unknown>[]) {
    this.#values = new Map(values);
    this.#order = [...order];
  }

  get size(): number {
    return this.#values.size;
  }

  has(task: Task<unknown>): boolean {
    return this.#values.has(task._id);
  }

  get<T>(task: Task<T>): T {
    if (!this.#values.has(task._id)) {
      throw new RangeError(`Task '${task.label}' has no result in this table`);
    }
    // Keys are only ever written with the value of the task they identify
    return this.#values.get(task._id) as T;
  }

  /** Tasks in the order they were executed */
  tasks(): readonly Task<unknown>[] {
    return this.#order;
  }

  *entries(): IterableIterator<[Task<unknown>, unknown]> {
    for (const task of this.#order) {
      yield [task, this.#values.get(task._id)];
    }
  }
}
