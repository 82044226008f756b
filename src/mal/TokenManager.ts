/**
 * Token Manager
 *
 * Keeps a usable MAL access token in the config file. The file is loaded on
 * every call; a new token is written back before it is handed out.
 */

import {
  exchangeAuthorizationCode,
  exchangeRefreshToken,
  isTokenExpired,
  MalAuthError,
  type MalAuthOptions,
} from './MalAuth.js';
import type { MalToken } from './types.js';
import { credentialsOf, type ConfigStore, type StoredConfig, type TokenState } from '../config/index.js';
import { AuthError } from '../errors.js';

export type TokenStatus = 'absent' | 'valid' | 'expired';

export interface TokenManagerOptions extends MalAuthOptions {
  safetyMarginSeconds: number;
  /** Clock in milliseconds, replaceable in tests */
  now?: () => number;
}

/**
 * Classify the stored token
 */
export function tokenStatus(
  config: Pick<StoredConfig, 'access_token' | 'expires_at'>,
  nowSeconds: number,
  marginSeconds: number
): TokenStatus {
  if (!config.access_token) return 'absent';
  return isTokenExpired(config.expires_at, nowSeconds, marginSeconds) ? 'expired' : 'valid';
}

export class TokenManager {
  // Shared by concurrent callers so one expiry triggers one exchange
  private inFlight: Promise<string> | null = null;

  constructor(
    private readonly store: ConfigStore,
    private readonly options: TokenManagerOptions
  ) {}

  /**
   * Return a valid access token, exchanging and persisting a new one if needed
   */
  async ensureValid(): Promise<string> {
    if (this.inFlight) {
      return this.inFlight;
    }

    const pending = this.resolveToken().finally(() => {
      this.inFlight = null;
    });
    this.inFlight = pending;
    return pending;
  }

  /**
   * Mark a token MAL rejected as expired so the next call exchanges a new one
   *
   * Does nothing when the file already holds a different token.
   */
  async invalidate(rejectedToken: string): Promise<void> {
    const config = await this.store.load();
    if (config.access_token !== rejectedToken) {
      return;
    }

    await this.store.save({ access_token: rejectedToken, expires_at: 0 });
    console.warn('[Token] Access token rejected by MAL, marked expired');
  }

  private nowSeconds(): number {
    const now = this.options.now ?? Date.now;
    return Math.floor(now() / 1000);
  }

  private async resolveToken(): Promise<string> {
    const config = await this.store.load();
    const status = tokenStatus(config, this.nowSeconds(), this.options.safetyMarginSeconds);

    if (status === 'valid' && config.access_token) {
      return config.access_token;
    }

    const credentials = credentialsOf(config);
    const failures: string[] = [];

    const refreshToken = config.refresh_token;
    if (refreshToken) {
      console.log(`[Token] Access token ${status}, trying refresh token`);
      const token = await this.attempt(
        () => exchangeRefreshToken(this.options, credentials, refreshToken),
        failures
      );
      if (token) {
        return this.persist(token, refreshToken);
      }
    } else {
      failures.push('no refresh_token in config');
    }

    const { authorizationCode, codeVerifier } = credentials;
    if (authorizationCode && codeVerifier) {
      console.log('[Token] Trying authorization code exchange');
      const token = await this.attempt(
        () => exchangeAuthorizationCode(this.options, credentials, authorizationCode, codeVerifier),
        failures
      );
      if (token) {
        return this.persist(token, config.refresh_token);
      }
    } else {
      failures.push('no authorization_code and code_verifier in config');
    }

    throw new AuthError(`Could not obtain an access token: ${failures.join('; ')}`, 'token');
  }

  /**
   * Run one exchange; a rejected exchange is recorded and yields null
   */
  private async attempt(
    exchange: () => Promise<MalToken>,
    failures: string[]
  ): Promise<MalToken | null> {
    try {
      return await exchange();
    } catch (error) {
      if (!(error instanceof MalAuthError)) {
        throw error;
      }
      console.warn(`[Token] ${error.message}`);
      failures.push(error.message);
      return null;
    }
  }

  private async persist(token: MalToken, previousRefreshToken?: string): Promise<string> {
    const state: TokenState = {
      access_token: token.access_token,
      refresh_token: token.refresh_token ?? previousRefreshToken,
      expires_at: this.nowSeconds() + Math.floor(token.expires_in),
    };

    await this.store.save(state);
    console.log(`[Token] Stored new access token, expires at ${new Date(state.expires_at * 1000).toISOString()}`);
    return state.access_token;
  }
}
