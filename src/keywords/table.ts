import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import type { Story } from './stories.js';

export const STORY_COLUMNS = ['objectID', 'created_at', 'url', 'points', 'title'] as const;

const TitleRowsSchema = z.array(z.object({ title: z.string() }));

/** Render stories as CSV text with a header row. */
export function storiesToCsv(stories: Iterable<Story>): string {
  const rows = Array.from(stories, (story) => ({
    objectID: story.objectID,
    created_at: story.created_at,
    url: story.url ?? '',
    points: story.points,
    title: story.title
  }));
  return stringify(rows, { header: true, columns: [...STORY_COLUMNS] });
}

/** Read the title column back out of CSV produced by storiesToCsv. */
export function extractTitles(csv: string): string[] {
  const records: unknown = parse(csv, { columns: true, skip_empty_lines: true });
  return TitleRowsSchema.parse(records).map((row) => row.title);
}
