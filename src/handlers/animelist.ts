/**
 * Anime List Handler
 *
 * Validates the request, makes sure a token is available, then fetches the
 * user's list and the ids dataset side by side and merges them.
 */

import {
  isListStatus,
  LIST_STATUSES,
  type ListStatus,
  type MalService,
  type WatchlistEntry,
} from '../mal/index.js';
import type { AnimeIdsService, DatasetMap } from '../animeIds/index.js';
import type { ConfigStore } from '../config/index.js';
import { AuthError, BadRequestError, ConfigError, errorMessage } from '../errors.js';
import type { AnimeListRecord } from '../types.js';
import { mergeAnimeList } from './merge.js';

const DEFAULT_STATUS: ListStatus = 'watching';

export interface AnimeListRequest {
  username: string;
  status: ListStatus;
}

/**
 * Anything that can hand out a valid MAL access token
 */
export interface AccessTokenSource {
  ensureValid(): Promise<string>;
  invalidate(rejectedToken: string): Promise<void>;
}

export interface AnimeListDeps {
  store: ConfigStore;
  tokens: AccessTokenSource;
  mal: Pick<MalService, 'getAnimeList'>;
  animeIds: Pick<AnimeIdsService, 'fetch'>;
}

/**
 * Validate query parameters
 *
 * A missing username falls back to the `username` field of the config file.
 */
export async function parseAnimeListRequest(
  query: { username?: string; status?: string },
  store: ConfigStore
): Promise<AnimeListRequest> {
  const status = query.status?.trim() || DEFAULT_STATUS;
  if (!isListStatus(status)) {
    throw new BadRequestError(`status must be one of: ${LIST_STATUSES.join(', ')}`);
  }

  let username = query.username?.trim();
  if (!username) {
    username = await configuredUsername(store);
  }
  if (!username) {
    throw new BadRequestError('username query parameter or config "username" is required');
  }

  return { username, status };
}

/**
 * Username from the config file; an unusable file means there is none
 */
async function configuredUsername(store: ConfigStore): Promise<string | undefined> {
  try {
    const config = await store.load();
    return config.username?.trim();
  } catch (error) {
    if (!(error instanceof ConfigError)) {
      throw error;
    }
    console.warn(`[AnimeList] No fallback username: ${error.message}`);
    return undefined;
  }
}

/**
 * Fetch and enrich one user's anime list
 *
 * A token MAL rejects is marked expired so the next request refreshes it.
 */
export async function getAnimeList(
  deps: AnimeListDeps,
  request: AnimeListRequest
): Promise<AnimeListRecord[]> {
  const accessToken = await deps.tokens.ensureValid();

  let watchlist: WatchlistEntry[];
  let dataset: DatasetMap;
  try {
    [watchlist, dataset] = await Promise.all([
      deps.mal.getAnimeList(request.username, request.status, accessToken),
      deps.animeIds.fetch(),
    ]);
  } catch (error) {
    if (error instanceof AuthError && error.stage === 'watchlist') {
      await invalidateQuietly(deps.tokens, accessToken);
    }
    throw error;
  }

  const records = mergeAnimeList(watchlist, dataset);
  const matched = records.filter(record => record.tvdbId !== undefined || record.imdbId !== undefined).length;
  console.log(`[AnimeList] ${request.username}/${request.status}: ${records.length} entries, ${matched} with external ids`);
  return records;
}

async function invalidateQuietly(tokens: AccessTokenSource, accessToken: string): Promise<void> {
  try {
    await tokens.invalidate(accessToken);
  } catch (invalidateError) {
    console.error(`[AnimeList] Could not mark rejected token expired: ${errorMessage(invalidateError)}`);
  }
}
