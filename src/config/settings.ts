/**
 * Runtime settings read from the environment
 */

import { z } from 'zod';

export const MAL_TOKEN_URL = 'https://myanimelist.net/v1/oauth2/token';
export const MAL_API_BASE = 'https://api.myanimelist.net/v2';
export const ANIME_IDS_URL =
  'https://raw.githubusercontent.com/Kometa-Team/Anime-IDs/master/anime_ids.json';

const settingsSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  HOST: z.string().min(1).default('0.0.0.0'),
  CONFIG_PATH: z.string().min(1).default('config.json'),
  MAL_TOKEN_URL: z.string().url().default(MAL_TOKEN_URL),
  MAL_API_BASE: z.string().url().default(MAL_API_BASE),
  ANIME_IDS_URL: z.string().url().default(ANIME_IDS_URL),
  TOKEN_SAFETY_MARGIN_SECONDS: z.coerce.number().int().min(0).default(60),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  DATASET_CACHE_TTL_SECONDS: z.coerce.number().int().min(0).default(0),
});

export interface Settings {
  port: number;
  host: string;
  configPath: string;
  malTokenUrl: string;
  malApiBase: string;
  animeIdsUrl: string;
  tokenSafetyMarginSeconds: number;
  httpTimeoutMs: number;
  datasetCacheTtlSeconds: number;
}

/**
 * Build settings from environment variables, applying defaults
 *
 * Empty strings count as unset so that `PORT=` in a .env file falls back too.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );

  const result = settingsSchema.safeParse(present);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment: ${issues}`);
  }

  const parsed = result.data;
  return {
    port: parsed.PORT,
    host: parsed.HOST,
    configPath: parsed.CONFIG_PATH,
    malTokenUrl: parsed.MAL_TOKEN_URL,
    malApiBase: parsed.MAL_API_BASE.replace(/\/+$/, ''),
    animeIdsUrl: parsed.ANIME_IDS_URL,
    tokenSafetyMarginSeconds: parsed.TOKEN_SAFETY_MARGIN_SECONDS,
    httpTimeoutMs: parsed.HTTP_TIMEOUT_MS,
    datasetCacheTtlSeconds: parsed.DATASET_CACHE_TTL_SECONDS,
  };
}
