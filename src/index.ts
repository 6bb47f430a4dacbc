/**
 * Pipeline - dependency-ordered task runner
 *
 * Register tasks against an explicit pipeline, then run them once each,
 * dependencies first, and read their values from the result table.
 *
 * @example
 * import { createPipeline } from 'hn-keywords';
 *
 * const pipeline = createPipeline();
 * const dump = pipeline.register('load', [], () => loadStories(path));
 * const count = pipeline.register('count', [dump], (d) => d.stories.length);
 *
 * const results = pipeline.run();
 * results.get(count);
 */

export type { Task, TaskValue, UnwrapTasks, Result, Ok, Err, PipelineEvent } from './core.js';
export { ok, err } from './core.js';
export { ConfigurationError } from './errors.js';
export { createPipeline } from './pipeline.js';
export type { Pipeline, PipelineOptions } from './pipeline.js';
export { ResultTable } from './result-table.js';
export { getTrace, getEdges } from './trace.js';
export {
  createRunLogger,
  createStreamLogger,
  describeEvent,
  logPipelineEvents
} from './logger.js';
export type { RunLogger, LogStream } from './logger.js';
export * from './keywords/index.js';
