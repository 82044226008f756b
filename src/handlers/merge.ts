/**
 * Merge
 *
 * Joins watch-list entries with the anime ids dataset. Every entry is kept,
 * in list order; ids the dataset does not know are left out.
 */

import type { DatasetMap } from '../animeIds/index.js';
import type { WatchlistEntry } from '../mal/index.js';
import type { AnimeListRecord } from '../types.js';

export function mergeAnimeList(watchlist: WatchlistEntry[], dataset: DatasetMap): AnimeListRecord[] {
  return watchlist.map((item): AnimeListRecord => {
    const ids = dataset.get(item.malId);
    const record: AnimeListRecord = { title: item.title, malId: item.malId };

    if (ids?.tvdbId !== undefined) {
      record.tvdbId = ids.tvdbId;
    }

    if (ids?.imdbId !== undefined) {
      return { ...record, imdb_id: ids.imdbId, imdbId: ids.imdbId };
    }
    return record;
  });
}
