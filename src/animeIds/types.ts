/**
 * Anime ID dataset types
 */

import { z } from 'zod';

/**
 * Cross-reference ids known for one MAL anime
 */
export interface DatasetEntry {
  malId: number;
  tvdbId?: number;
  imdbId?: string;
}

export type DatasetMap = Map<number, DatasetEntry>;

export const positiveIntSchema = z.union([
  z.number().int().positive(),
  z
    .string()
    .regex(/^\d+$/)
    .transform(Number)
    .pipe(z.number().int().positive()),
]);

/**
 * One record of anime_ids.json. Only the fields used here are checked; the
 * rest (anidb_id, anilist_id, tmdb ids, season offsets) are ignored.
 */
export const rawDatasetEntrySchema = z.object({
  mal_id: positiveIntSchema.optional().catch(undefined),
  tvdb_id: positiveIntSchema.optional().catch(undefined),
  imdb_id: z.string().trim().min(1).optional().catch(undefined),
});
