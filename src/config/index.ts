/**
 * Config Module
 */

export { ConfigStore, credentialsOf } from './ConfigStore.js';
export type { StoredConfig, Credentials, TokenState } from './ConfigStore.js';
export { loadSettings, MAL_TOKEN_URL, MAL_API_BASE, ANIME_IDS_URL } from './settings.js';
export type { Settings } from './settings.js';
