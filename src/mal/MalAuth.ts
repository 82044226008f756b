/**
 * MyAnimeList OAuth token endpoint
 *
 * MAL issues tokens from the authorization-code (PKCE) grant and refreshes
 * them with the refresh_token grant. Both are form-encoded POSTs.
 */

import { describeMalError, malTokenSchema, type MalToken } from './types.js';
import type { Credentials } from '../config/index.js';
import { fetchWithTimeout, readJson, type FetchLike } from '../utils/http.js';
import { errorMessage } from '../errors.js';

/**
 * Error thrown when a token exchange fails
 */
export class MalAuthError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
    public readonly code?: string
  ) {
    super(message);
    this.name = 'MalAuthError';
  }
}

export interface MalAuthOptions {
  tokenUrl: string;
  timeoutMs: number;
  fetchImpl?: FetchLike;
}

async function requestToken(
  options: MalAuthOptions,
  body: Record<string, string>,
  description: string
): Promise<MalToken> {
  let response: Response;
  try {
    response = await fetchWithTimeout(
      options.tokenUrl,
      {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          Accept: 'application/json',
        },
        body: new URLSearchParams(body).toString(),
      },
      options.timeoutMs,
      options.fetchImpl
    );
  } catch (error) {
    throw new MalAuthError(`${description} request failed: ${errorMessage(error)}`);
  }

  const payload = await readJson(response);

  if (!response.ok) {
    const error = describeMalError(payload);
    throw new MalAuthError(
      `${description} rejected (${response.status}): ${error.summary}`,
      response.status,
      error.error
    );
  }

  const token = malTokenSchema.safeParse(payload);
  if (!token.success) {
    throw new MalAuthError(`${description} returned an unusable token response`, response.status);
  }

  return token.data;
}

/**
 * Exchange a refresh token for a new token pair
 */
export async function exchangeRefreshToken(
  options: MalAuthOptions,
  credentials: Credentials,
  refreshToken: string
): Promise<MalToken> {
  return requestToken(
    options,
    {
      grant_type: 'refresh_token',
      client_id: credentials.clientId,
      client_secret: credentials.clientSecret,
      refresh_token: refreshToken,
    },
    'Refresh token exchange'
  );
}

/**
 * Exchange an authorization code (with its PKCE verifier) for a token pair
 */
export async function exchangeAuthorizationCode(
  options: MalAuthOptions,
  credentials: Credentials,
  code: string,
  codeVerifier: string
): Promise<MalToken> {
  return requestToken(
    options,
    {
      grant_type: 'authorization_code',
      client_id: credentials.clientId,
      client_secret: credentials.clientSecret,
      code,
      code_verifier: codeVerifier,
    },
    'Authorization code exchange'
  );
}

/**
 * Check whether a token is expired or inside the safety margin
 *
 * A token is only valid while expiresAt is strictly after now + margin.
 *
 * @param expiresAt - Unix timestamp (seconds); undefined counts as expired
 * @param nowSeconds - Current unix time in seconds
 * @param marginSeconds - Treat as expired this many seconds early
 */
export function isTokenExpired(
  expiresAt: number | undefined,
  nowSeconds: number,
  marginSeconds = 60
): boolean {
  if (expiresAt === undefined) return true;
  return !(expiresAt > nowSeconds + marginSeconds);
}
