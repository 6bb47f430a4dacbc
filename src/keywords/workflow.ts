import type { Task } from '../core.js';
import { createPipeline } from '../pipeline.js';
import type { Pipeline, PipelineOptions } from '../pipeline.js';
import { KeywordReportConfigSchema } from './config.js';
import type { KeywordReportConfig, KeywordReportConfigInput } from './config.js';
import { countKeywords, rankKeywords } from './frequency.js';
import type { KeywordCount } from './frequency.js';
import { loadStopWords } from './stop-words.js';
import { loadStories, popularStories } from './stories.js';
import type { Story, StoryDump } from './stories.js';
import { extractTitles, storiesToCsv } from './table.js';
import { cleanTitles } from './text.js';

export interface KeywordTasks {
  readonly load: Task<StoryDump>;
  readonly stopWords: Task<ReadonlySet<string>>;
  readonly filter: Task<Iterable<Story>>;
  readonly tabulate: Task<string>;
  readonly extract: Task<string[]>;
  readonly clean: Task<Iterable<string>>;
  readonly aggregate: Task<Map<string, number>>;
  readonly rank: Task<KeywordCount[]>;
}

export function registerKeywordTasks(
  pipeline: Pipeline,
  config: KeywordReportConfig
): KeywordTasks {
  const criteria = {
    minPoints: config.min_points,
    minComments: config.min_comments,
    excludedTitlePrefix: config.excluded_title_prefix
  };

  const load = pipeline.register('load', [], () => loadStories(config.input_path));
  const stopWords = pipeline.register('stop-words', [], () =>
    loadStopWords(config.stop_words_path)
  );
  const filter = pipeline.register('filter', [load], (dump): Iterable<Story> =>
    popularStories(dump, criteria)
  );
  const tabulate = pipeline.register('tabulate', [filter], (stories) => storiesToCsv(stories));
  const extract = pipeline.register('extract', [tabulate], (csv) => extractTitles(csv));
  const clean = pipeline.register('clean', [extract], (titles): Iterable<string> =>
    cleanTitles(titles)
  );
  const aggregate = pipeline.register('aggregate', [clean, stopWords], (cleaned, words) =>
    countKeywords(cleaned, words)
  );
  const rank = pipeline.register('rank', [aggregate], (counts) =>
    rankKeywords(counts, config.limit)
  );

  return { load, stopWords, filter, tabulate, extract, clean, aggregate, rank };
}

/**
 * Run the full keyword report: load, filter, tabulate, extract, clean,
 * aggregate and rank.
 */
export function runKeywordReport(
  input: KeywordReportConfigInput,
  options: PipelineOptions = {}
): KeywordCount[] {
  const config = KeywordReportConfigSchema.parse(input);
  const pipeline = createPipeline(options);
  const tasks = registerKeywordTasks(pipeline, config);
  return pipeline.run().get(tasks.rank);
}
