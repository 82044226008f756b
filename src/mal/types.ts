/**
 * MyAnimeList API Type Definitions
 */

import { z } from 'zod';

/**
 * List statuses MAL accepts as a filter on /users/{name}/animelist
 */
export const LIST_STATUSES = ['watching', 'completed', 'on_hold', 'dropped', 'plan_to_watch'] as const;

export type ListStatus = (typeof LIST_STATUSES)[number];

export function isListStatus(value: string): value is ListStatus {
  return LIST_STATUSES.some(status => status === value);
}

/**
 * MAL OAuth token response
 */
export const malTokenSchema = z.object({
  token_type: z.string().optional(),
  expires_in: z.coerce.number().nonnegative().default(0),
  access_token: z.string().min(1),
  refresh_token: z.string().min(1).optional(),
});

export type MalToken = z.infer<typeof malTokenSchema>;

/**
 * MAL error body (token endpoint and API)
 */
export const malErrorSchema = z.object({
  error: z.string().optional(),
  message: z.string().optional(),
  hint: z.string().optional(),
});

export type MalError = z.infer<typeof malErrorSchema>;

/**
 * Human-readable summary of an error body, whatever shape it has
 */
export function describeMalError(payload: unknown): MalError & { summary: string } {
  const parsed = malErrorSchema.safeParse(payload);
  const error: MalError = parsed.success ? parsed.data : {};
  return { ...error, summary: error.message || error.error || 'no details' };
}

/**
 * One page of /users/{name}/animelist
 *
 * Items are checked one by one so a single odd entry does not sink the page.
 */
export const animeListPageSchema = z.object({
  data: z.array(z.unknown()),
  paging: z
    .object({
      next: z.string().optional(),
      previous: z.string().optional(),
    })
    .optional(),
});

export type AnimeListPage = z.infer<typeof animeListPageSchema>;

export const animeListItemSchema = z.object({
  node: z.object({
    id: z.number().int().positive(),
    title: z.string(),
  }),
  list_status: z
    .object({
      status: z.string().optional(),
    })
    .optional(),
});

/**
 * A watch-list entry as used inside the service
 */
export interface WatchlistEntry {
  malId: number;
  title: string;
  status?: ListStatus;
}
