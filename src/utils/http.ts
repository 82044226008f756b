/**
 * HTTP helpers shared by the MAL and dataset clients
 */

export type FetchLike = typeof fetch;

/**
 * fetch() that aborts once timeoutMs has elapsed
 */
export async function fetchWithTimeout(
  url: string,
  init: RequestInit,
  timeoutMs: number,
  fetchImpl: FetchLike = fetch
): Promise<Response> {
  return fetchImpl(url, { ...init, signal: AbortSignal.timeout(timeoutMs) });
}

/**
 * Read a response body as JSON, or null when it is not JSON
 */
export async function readJson(response: Response): Promise<unknown> {
  try {
    return (await response.json()) as unknown;
  } catch {
    return null;
  }
}
