/**
 * MyAnimeList Module
 *
 * Exports all MAL-related types and services.
 */

export * from './types.js';
export {
  MalAuthError,
  exchangeRefreshToken,
  exchangeAuthorizationCode,
  isTokenExpired,
} from './MalAuth.js';
export type { MalAuthOptions } from './MalAuth.js';
export { TokenManager, tokenStatus } from './TokenManager.js';
export type { TokenManagerOptions, TokenStatus } from './TokenManager.js';
export { MalService } from './MalService.js';
export type { MalServiceOptions } from './MalService.js';
