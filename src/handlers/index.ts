/**
 * Handlers Module
 */

export { getAnimeList, parseAnimeListRequest } from './animelist.js';
export type { AnimeListDeps, AnimeListRequest, AccessTokenSource } from './animelist.js';
export { mergeAnimeList } from './merge.js';
