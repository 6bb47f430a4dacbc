import { readFileSync } from 'node:fs';
import { z } from 'zod';

const TIMESTAMP_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}Z$/;

// Date rolls overflowing fields forward (Feb 30 -> Mar 1, 24:00 -> next day),
// so a real date must format back to the same text
function isCalendarTimestamp(value: string): boolean {
  const date = new Date(value);
  return !Number.isNaN(date.getTime()) && `${date.toISOString().slice(0, 19)}Z` === value;
}

export const StorySchema = z.object({
  objectID: z.string(),
  created_at: z
    .string()
    .regex(TIMESTAMP_PATTERN, 'expected YYYY-MM-DDTHH:MM:SSZ')
    .refine(isCalendarTimestamp, 'not a valid date'),
  created_at_i: z.number().int().optional(),
  url: z.string().nullish(),
  author: z.string().optional(),
  points: z.number().int(),
  title: z.string(),
  num_comments: z.number().int()
});

export type Story = z.infer<typeof StorySchema>;

export const StoryDumpSchema = z.object({
  stories: z.array(StorySchema)
});

export type StoryDump = z.infer<typeof StoryDumpSchema>;

export interface PopularityCriteria {
  readonly minPoints: number;
  readonly minComments: number;
  readonly excludedTitlePrefix: string;
}

/**
 * Read and validate a story dump. Unknown fields are dropped; a record
 * missing a required field fails the whole load.
 */
export function loadStories(path: string): StoryDump {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  return StoryDumpSchema.parse(raw);
}

export function isPopular(story: Story, criteria: PopularityCriteria): boolean {
  return (
    story.points > criteria.minPoints &&
    story.num_comments > criteria.minComments &&
    (criteria.excludedTitlePrefix === '' ||
      !story.title.startsWith(criteria.excludedTitlePrefix))
  );
}

/** Lazily yields popular stories; single pass. */
export function* popularStories(
  dump: StoryDump,
  criteria: PopularityCriteria
): Generator<Story, void, undefined> {
  for (const story of dump.stories) {
    if (isPopular(story, criteria)) {
      yield story;
    }
  }
}
