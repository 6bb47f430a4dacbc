export {
  DEFAULT_STOP_WORDS_PATH,
  KeywordReportConfigSchema,
  type KeywordReportConfig,
  type KeywordReportConfigInput
} from './config.js';
export {
  StorySchema,
  type Story,
  StoryDumpSchema,
  type StoryDump,
  type PopularityCriteria,
  loadStories,
  isPopular,
  popularStories
} from './stories.js';
export { STORY_COLUMNS, storiesToCsv, extractTitles } from './table.js';
export { cleanTitle, cleanTitles } from './text.js';
export { countKeywords, rankKeywords, type KeywordCount } from './frequency.js';
export { loadStopWords } from './stop-words.js';
export { registerKeywordTasks, runKeywordReport, type KeywordTasks } from './workflow.js';
