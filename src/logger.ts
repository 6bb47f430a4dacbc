import { appendFileSync, writeFileSync } from 'node:fs';
import type { PipelineEvent } from './core.js';

export interface RunLogger {
  log(message: string): void;
}

/** Anything with a write(string) method, such as process.stderr */
export interface LogStream {
  write(chunk: string): unknown;
}

function formatLine(message: string): string {
  return `[${new Date().toISOString()}] ${message}\n`;
}

export function createRunLogger(logPath: string): RunLogger {
  // Initialize the log file (truncate if exists)
  writeFileSync(logPath, '');

  return {
    log(message: string): void {
      appendFileSync(logPath, formatLine(message));
    }
  };
}

export function createStreamLogger(stream: LogStream): RunLogger {
  return {
    log(message: string): void {
      stream.write(formatLine(message));
    }
  };
}

export function describeEvent(event: PipelineEvent): string {
  switch (event.kind) {
    case 'run:start':
      return `Pipeline started with ${event.taskCount} tasks`;
    case 'task:start':
      return `Task '${event.label}' started`;
    case 'task:done':
      return `Task '${event.label}' completed`;
    case 'task:error': {
      const message = event.error instanceof Error ? event.error.message : String(event.error);
      return `Task '${event.label}' failed: ${message}`;
    }
    case 'run:done':
      return `Pipeline completed ${event.taskCount} tasks`;
  }
}

/** Adapts a logger into a Pipeline onEvent listener */
export function logPipelineEvents(logger: RunLogger): (event: PipelineEvent) => void {
  return (event) => logger.log(describeEvent(event));
}
