/**
 * IMDb id under both naming conventions; present together or not at all
 */
export type ImdbIds =
  | { imdb_id: string; imdbId: string }
  | { imdb_id?: never; imdbId?: never };

/**
 * One enriched anime list entry as returned by GET /animelist
 */
export type AnimeListRecord = {
  title: string;
  malId: number;
  tvdbId?: number;
} & ImdbIds;

/**
 * Body of every non-200 response
 */
export interface ErrorBody {
  error: string;
  stage: string;
}
