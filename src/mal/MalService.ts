/**
 * MyAnimeList Service
 *
 * Fetches a user's anime list, following MAL's paging links until the last
 * page. One attempt per page; failures surface to the caller.
 */

import {
  animeListItemSchema,
  animeListPageSchema,
  describeMalError,
  isListStatus,
  type AnimeListPage,
  type ListStatus,
  type WatchlistEntry,
} from './types.js';
import { AuthError, UpstreamError, errorMessage } from '../errors.js';
import { fetchWithTimeout, readJson, type FetchLike } from '../utils/http.js';

const PAGE_LIMIT = 100;

export interface MalServiceOptions {
  apiBase: string;
  timeoutMs: number;
  fetchImpl?: FetchLike;
}

export class MalService {
  constructor(private readonly options: MalServiceOptions) {}

  /**
   * URL of the first page of a user's list
   */
  animeListUrl(username: string, status: ListStatus): string {
    const params = new URLSearchParams({
      status,
      limit: String(PAGE_LIMIT),
      fields: 'list_status',
    });
    return `${this.options.apiBase}/users/${encodeURIComponent(username)}/animelist?${params.toString()}`;
  }

  /**
   * Fetch every page of a user's list for one status, in MAL's order
   */
  async getAnimeList(
    username: string,
    status: ListStatus,
    accessToken: string
  ): Promise<WatchlistEntry[]> {
    const entries: WatchlistEntry[] = [];
    let url: string | undefined = this.animeListUrl(username, status);
    let pages = 0;

    while (url) {
      const page = await this.fetchPage(url, accessToken);
      pages++;

      for (const item of page.data) {
        const entry = toWatchlistEntry(item);
        if (entry) {
          entries.push(entry);
        } else {
          console.warn(`[MAL] Skipping list item without a usable node for ${username}`);
        }
      }

      url = page.paging?.next || undefined;
    }

    console.log(`[MAL] Fetched ${entries.length} ${status} entries for ${username} (${pages} pages)`);
    return entries;
  }

  private async fetchPage(url: string, accessToken: string): Promise<AnimeListPage> {
    let response: Response;
    try {
      response = await fetchWithTimeout(
        url,
        {
          method: 'GET',
          headers: {
            Authorization: `Bearer ${accessToken}`,
            Accept: 'application/json',
          },
        },
        this.options.timeoutMs,
        this.options.fetchImpl
      );
    } catch (error) {
      throw new UpstreamError(
        `Anime list request failed: ${errorMessage(error)}`,
        'watchlist',
        undefined,
        { cause: error }
      );
    }

    const payload = await readJson(response);

    if (response.status === 401 || response.status === 403) {
      throw new AuthError(
        `MAL rejected the access token (${response.status}): ${describeMalError(payload).summary}`,
        'watchlist'
      );
    }

    if (!response.ok) {
      throw new UpstreamError(
        `Anime list request failed (${response.status}): ${describeMalError(payload).summary}`,
        'watchlist',
        response.status
      );
    }

    const page = animeListPageSchema.safeParse(payload);
    if (!page.success) {
      throw new UpstreamError('Anime list response is not a list page', 'watchlist', response.status);
    }

    return page.data;
  }
}

function toWatchlistEntry(item: unknown): WatchlistEntry | null {
  const parsed = animeListItemSchema.safeParse(item);
  if (!parsed.success) return null;

  const { node, list_status: listStatus } = parsed.data;
  const entry: WatchlistEntry = { malId: node.id, title: node.title };
  if (listStatus?.status && isListStatus(listStatus.status)) {
    entry.status = listStatus.status;
  }
  return entry;
}
