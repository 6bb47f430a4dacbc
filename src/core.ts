/**
 * Task - node in a pipeline's dependency graph
 *
 * Handles are created by Pipeline.register() and carry no behaviour of
 * their own; the owning pipeline keeps the computation.
 */

export declare const taskValue: unique symbol;

/**
 * Opaque handle for a registered task
 *
 * @template T - Value produced by the task's computation
 */
export interface Task<T> {
  readonly label: string;
  readonly deps: readonly Task<unknown>[];
  readonly _id: symbol;

  // Type-level only: never present at runtime
  readonly [taskValue]?: T;
}

export type TaskValue<TTask> = TTask extends Task<infer U> ? U : never;

export type UnwrapTasks<T extends readonly Task<unknown>[]> = {
  [K in keyof T]: TaskValue<T[K]>;
};

/**
 * Result of a computation that can succeed or fail
 */
export type Ok<T> = { ok: true; value: T };
export type Err<E> = { ok: false; error: E; errorTask: Task<unknown> };
export type Result<T, E> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(task: Task<unknown>, error: E): Err<E> {
  return { ok: false, error, errorTask: task };
}

export type PipelineEvent =
  | { kind: 'run:start'; taskCount: number }
  | { kind: 'task:start'; label: string }
  | { kind: 'task:done'; label: string }
  | { kind: 'task:error'; label: string; error: unknown }
  | { kind: 'run:done'; taskCount: number };
