/**
 * Anime IDs Dataset
 *
 * Downloads the Kometa anime_ids.json mapping and indexes it by MAL id.
 * The document is an object keyed by AniDB id, each value carrying mal_id,
 * tvdb_id, imdb_id and friends. Arrays of the same records are accepted too.
 */

import { rawDatasetEntrySchema, positiveIntSchema, type DatasetEntry, type DatasetMap } from './types.js';
import { UpstreamError, errorMessage } from '../errors.js';
import { fetchWithTimeout, readJson, type FetchLike } from '../utils/http.js';

export interface AnimeIdsServiceOptions {
  url: string;
  timeoutMs: number;
  /** Reuse a downloaded map for this long; 0 downloads on every call */
  cacheTtlSeconds: number;
  fetchImpl?: FetchLike;
  now?: () => number;
}

/**
 * Index a parsed dataset document by MAL id
 *
 * Entries without a usable MAL id are skipped. For keyed documents the key
 * stands in when an entry has no mal_id of its own, but never replaces an
 * entry that named its mal_id. Among entries naming the same mal_id the
 * later one wins.
 */
export function buildDatasetMap(document: Record<string, unknown> | unknown[]): DatasetMap {
  const map: DatasetMap = new Map();
  const explicit = new Set<number>();
  const records: Array<[string | undefined, unknown]> = Array.isArray(document)
    ? document.map((value): [undefined, unknown] => [undefined, value])
    : Object.entries(document);

  let skipped = 0;
  for (const [key, value] of records) {
    const parsed = toDatasetEntry(key, value);
    if (!parsed) {
      skipped++;
      continue;
    }

    const { entry, fromKey } = parsed;
    if (!fromKey) {
      explicit.add(entry.malId);
      map.set(entry.malId, entry);
    } else if (!explicit.has(entry.malId)) {
      map.set(entry.malId, entry);
    }
  }

  if (skipped > 0) {
    console.log(`[AnimeIds] Skipped ${skipped} entries without a MAL id`);
  }
  return map;
}

function toDatasetEntry(
  key: string | undefined,
  value: unknown
): { entry: DatasetEntry; fromKey: boolean } | null {
  const parsed = rawDatasetEntrySchema.safeParse(value);
  if (!parsed.success) return null;

  const raw = parsed.data;
  let malId = raw.mal_id;
  const fromKey = malId === undefined;
  if (malId === undefined && key !== undefined) {
    const keyId = positiveIntSchema.safeParse(key);
    malId = keyId.success ? keyId.data : undefined;
  }
  if (malId === undefined) return null;

  const entry: DatasetEntry = { malId };
  if (raw.tvdb_id !== undefined) entry.tvdbId = raw.tvdb_id;
  if (raw.imdb_id !== undefined) entry.imdbId = raw.imdb_id;
  return { entry, fromKey };
}

export class AnimeIdsService {
  private cached: { map: DatasetMap; fetchedAt: number } | null = null;
  private inFlight: Promise<DatasetMap> | null = null;

  constructor(private readonly options: AnimeIdsServiceOptions) {}

  /**
   * Get the MAL id → cross-reference ids mapping
   */
  async fetch(): Promise<DatasetMap> {
    const now = (this.options.now ?? Date.now)();
    const ttlMs = this.options.cacheTtlSeconds * 1000;

    if (this.cached && ttlMs > 0 && now - this.cached.fetchedAt < ttlMs) {
      return this.cached.map;
    }

    if (this.inFlight) {
      return this.inFlight;
    }

    const pending = this.download()
      .then(map => {
        if (ttlMs > 0) {
          this.cached = { map, fetchedAt: now };
        }
        return map;
      })
      .finally(() => {
        this.inFlight = null;
      });
    this.inFlight = pending;
    return pending;
  }

  private async download(): Promise<DatasetMap> {
    const start = Date.now();
    let response: Response;
    try {
      response = await fetchWithTimeout(
        this.options.url,
        { method: 'GET', headers: { Accept: 'application/json' } },
        this.options.timeoutMs,
        this.options.fetchImpl
      );
    } catch (error) {
      throw new UpstreamError(
        `Anime ids download failed: ${errorMessage(error)}`,
        'dataset',
        undefined,
        { cause: error }
      );
    }

    if (!response.ok) {
      throw new UpstreamError(
        `Anime ids download failed (${response.status})`,
        'dataset',
        response.status
      );
    }

    const document = await readJson(response);
    if (typeof document !== 'object' || document === null) {
      throw new UpstreamError('Anime ids document is not a JSON object or array', 'dataset', response.status);
    }

    const map = buildDatasetMap(Array.isArray(document) ? document : { ...document });
    console.log(`[AnimeIds] Indexed ${map.size} MAL ids in ${Date.now() - start}ms`);
    return map;
  }
}
