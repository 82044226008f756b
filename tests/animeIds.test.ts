/**
 * AnimeIdsService Tests
 */

import { describe, it, expect } from '@jest/globals';
import { AnimeIdsService, buildDatasetMap } from '../src/animeIds/index.js';
import { UpstreamError } from '../src/errors.js';
import { jsonResponse, mockFetch, type Route } from './fetchMock.js';

const DATASET_URL = 'https://data.test/anime_ids.json';

function createService(route: Route, cacheTtlSeconds = 0, now: () => number = () => 0) {
  const fetchImpl = mockFetch(route);
  const service = new AnimeIdsService({ url: DATASET_URL, timeoutMs: 1000, cacheTtlSeconds, fetchImpl, now });
  return { service, fetchImpl };
}

describe('buildDatasetMap', () => {
  it('should index keyed entries by their mal_id', () => {
    const map = buildDatasetMap({
      '23': { tvdb_id: 76885, tvdb_season: 1, mal_id: 1, anilist_id: 1, imdb_id: 'tt0213338' },
      '24': { tvdb_id: 79089, mal_id: 6, imdb_id: 'tt0251439' },
    });

    expect([...map.keys()]).toEqual([1, 6]);
    expect(map.get(1)).toEqual({ malId: 1, tvdbId: 76885, imdbId: 'tt0213338' });
  });

  it('should fall back to the key when an entry has no mal_id', () => {
    const map = buildDatasetMap({ '30': { tvdb_id: 70350 }, 'not-a-number': { tvdb_id: 1 } });

    expect(map.get(30)).toEqual({ malId: 30, tvdbId: 70350 });
    expect(map.size).toBe(1);
  });

  it('should accept an array of entries', () => {
    const map = buildDatasetMap([{ mal_id: 1, tvdb_id: 76885 }, { tvdb_id: 5 }]);

    expect(map.get(1)).toEqual({ malId: 1, tvdbId: 76885 });
    expect(map.size).toBe(1);
  });

  it('should accept numeric strings and drop invalid id fields', () => {
    const map = buildDatasetMap([
      { mal_id: '20', tvdb_id: '78857', imdb_id: 'tt0988824' },
      { mal_id: 21, tvdb_id: 'unknown', imdb_id: '' },
      { mal_id: 22, tvdb_id: -1, imdb_id: 42 },
    ]);

    expect(map.get(20)).toEqual({ malId: 20, tvdbId: 78857, imdbId: 'tt0988824' });
    expect(map.get(21)).toEqual({ malId: 21 });
    expect(map.get(22)).toEqual({ malId: 22 });
  });

  it('should skip entries that are not objects', () => {
    const map = buildDatasetMap({ '1': null, '2': 'junk', '3': [1, 2], '4': { mal_id: 4 } });

    expect([...map.keys()]).toEqual([4]);
  });

  it('should not let a key-derived id replace an entry naming its mal_id', () => {
    const map = buildDatasetMap({
      '1': { mal_id: 5, tvdb_id: 100, imdb_id: 'tt0000100' },
      '5': { tvdb_id: 999, imdb_id: 'tt0000999' },
    });

    expect(map.get(5)).toEqual({ malId: 5, tvdbId: 100, imdbId: 'tt0000100' });
    expect(map.get(1)).toBeUndefined();
  });

  it('should let a later mal_id entry replace a key-derived one', () => {
    const map = buildDatasetMap({
      '5': { tvdb_id: 999 },
      '7': { mal_id: 5, tvdb_id: 100 },
    });

    expect(map.get(5)).toEqual({ malId: 5, tvdbId: 100 });
  });

  it('should let the last entry win for a repeated mal_id', () => {
    const map = buildDatasetMap({
      '100': { mal_id: 9, tvdb_id: 1 },
      '101': { mal_id: 9, tvdb_id: 2 },
    });

    expect(map.get(9)).toEqual({ malId: 9, tvdbId: 2 });
  });
});

describe('AnimeIdsService', () => {
  it('should download and index the dataset', async () => {
    const { service, fetchImpl } = createService(() =>
      jsonResponse({ '23': { mal_id: 1, tvdb_id: 76885, imdb_id: 'tt0213338' } })
    );

    const map = await service.fetch();

    expect(map.get(1)).toEqual({ malId: 1, tvdbId: 76885, imdbId: 'tt0213338' });
    expect(fetchImpl.mock.calls[0][0]).toBe(DATASET_URL);
  });

  it('should download again on every call without a cache TTL', async () => {
    const { service, fetchImpl } = createService(() => jsonResponse({}));

    await service.fetch();
    await service.fetch();

    expect(fetchImpl).toHaveBeenCalledTimes(2);
  });

  it('should reuse the map within the cache TTL', async () => {
    let now = 0;
    const { service, fetchImpl } = createService(() => jsonResponse({ '1': { mal_id: 1 } }), 60, () => now);

    const first = await service.fetch();
    now = 59_999;
    const second = await service.fetch();
    now = 60_000;
    await service.fetch();

    expect(second).toBe(first);
    expect(fetchImpl).toHaveBeenCalledTimes(2);
  });

  it('should share one download between concurrent callers', async () => {
    const { service, fetchImpl } = createService(() => jsonResponse({ '1': { mal_id: 1 } }));

    const [a, b] = await Promise.all([service.fetch(), service.fetch()]);

    expect(a).toBe(b);
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it('should throw UpstreamError on a non-success status', async () => {
    const { service } = createService(() => new Response('Not Found', { status: 404 }));

    const attempt = service.fetch();

    await expect(attempt).rejects.toBeInstanceOf(UpstreamError);
    await expect(attempt).rejects.toMatchObject({ stage: 'dataset', upstreamStatus: 404 });
  });

  it('should throw UpstreamError when the document is not JSON', async () => {
    const { service } = createService(() => new Response('{"truncated": ', { status: 200 }));

    await expect(service.fetch()).rejects.toThrow('Anime ids document is not a JSON object or array');
  });

  it('should throw UpstreamError when the download fails', async () => {
    const { service } = createService(() => {
      throw new TypeError('fetch failed');
    });

    await expect(service.fetch()).rejects.toThrow('Anime ids download failed: fetch failed');
  });

  it('should not cache a failed download', async () => {
    let fail = true;
    const { service, fetchImpl } = createService(
      () => (fail ? jsonResponse({}, 503) : jsonResponse({ '1': { mal_id: 1 } })),
      3600
    );

    await expect(service.fetch()).rejects.toBeInstanceOf(UpstreamError);
    fail = false;
    const map = await service.fetch();
    expect(map.size).toBe(1);
    expect(fetchImpl).toHaveBeenCalledTimes(2);
  });
});
