import { fileURLToPath } from 'node:url';
import { z } from 'zod';

export const DEFAULT_STOP_WORDS_PATH = fileURLToPath(
  new URL('../../data/stop-words.json', import.meta.url)
);

export const KeywordReportConfigSchema = z.object({
  input_path: z.string().min(1),
  stop_words_path: z.string().min(1).default(DEFAULT_STOP_WORDS_PATH),
  min_points: z.number().int().nonnegative().default(50),
  min_comments: z.number().int().nonnegative().default(1),
  excluded_title_prefix: z.string().default('Ask HN'),
  limit: z.number().int().positive().default(100)
});

export type KeywordReportConfig = z.infer<typeof KeywordReportConfigSchema>;
export type KeywordReportConfigInput = z.input<typeof KeywordReportConfigSchema>;
