import { readFileSync } from 'node:fs';
import { z } from 'zod';

const StopWordListSchema = z.array(z.string());

/** Load a JSON array of stop words, lowercased. */
export function loadStopWords(path: string): ReadonlySet<string> {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  return new Set(StopWordListSchema.parse(raw).map((word) => word.toLowerCase()));
}
