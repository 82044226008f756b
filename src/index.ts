/**
 * Entry Point
 *
 * MyAnimeList watch-list service with TVDB/IMDb id enrichment
 */

// Load environment variables FIRST
import 'dotenv/config';

import { createServer, startServer } from './server.js';
import { ConfigStore, loadSettings } from './config/index.js';
import { MalService, TokenManager } from './mal/index.js';
import { AnimeIdsService } from './animeIds/index.js';
import { errorMessage } from './errors.js';

async function main(): Promise<void> {
  const settings = loadSettings();
  console.log(`Starting with config file ${settings.configPath}...`);

  const store = new ConfigStore(settings.configPath);
  // Unusable config is fatal here; later failures are reported per request
  await store.load();

  const tokens = new TokenManager(store, {
    tokenUrl: settings.malTokenUrl,
    timeoutMs: settings.httpTimeoutMs,
    safetyMarginSeconds: settings.tokenSafetyMarginSeconds,
  });
  const mal = new MalService({ apiBase: settings.malApiBase, timeoutMs: settings.httpTimeoutMs });
  const animeIds = new AnimeIdsService({
    url: settings.animeIdsUrl,
    timeoutMs: settings.httpTimeoutMs,
    cacheTtlSeconds: settings.datasetCacheTtlSeconds,
  });

  // Surface token problems at startup; requests will try again
  try {
    await tokens.ensureValid();
  } catch (error) {
    console.warn(`[Token] No access token on startup: ${errorMessage(error)}`);
  }

  const app = createServer({ store, tokens, mal, animeIds });

  await startServer(app, settings.port, settings.host);
  console.log(`\nAnime list service running at:`);
  console.log(`   http://${settings.host}:${settings.port}/animelist?username=<name>&status=watching`);
}

main().catch((error: unknown) => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
