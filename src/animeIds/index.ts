/**
 * Anime IDs Module
 */

export { AnimeIdsService, buildDatasetMap } from './AnimeIdsService.js';
export type { AnimeIdsServiceOptions } from './AnimeIdsService.js';
export type { DatasetEntry, DatasetMap } from './types.js';
