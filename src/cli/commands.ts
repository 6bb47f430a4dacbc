import { createRunLogger, createStreamLogger, logPipelineEvents } from '../logger.js';
import type { LogStream } from '../logger.js';
import type { KeywordCount } from '../keywords/frequency.js';
import { runKeywordReport } from '../keywords/workflow.js';
import type { ReportArgs } from './parse-args.js';

export interface CommandIO {
  readonly stdout: LogStream;
  readonly stderr: LogStream;
}

export function formatRanking(ranking: readonly KeywordCount[]): string {
  return ranking.map(([word, count], i) => `${i + 1}. ${word} ${count}`).join('\n');
}

export function runReport(args: ReportArgs, io: CommandIO): KeywordCount[] {
  const logger = args.logPath ? createRunLogger(args.logPath) : createStreamLogger(io.stderr);

  const ranking = runKeywordReport(
    {
      input_path: args.inputPath,
      ...(args.limit !== undefined ? { limit: args.limit } : {}),
      ...(args.stopWordsPath !== undefined ? { stop_words_path: args.stopWordsPath } : {})
    },
    { onEvent: logPipelineEvents(logger) }
  );

  if (ranking.length > 0) {
    io.stdout.write(`${formatRanking(ranking)}\n`);
  }
  return ranking;
}
