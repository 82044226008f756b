/**
 * Config Store
 *
 * Owns the JSON file holding the MAL client credentials and the current
 * token state. Each call reads the file afresh; nothing is kept open or
 * cached between requests.
 */

import { readFile, writeFile } from 'fs/promises';
import { z } from 'zod';
import { ConfigError, errorMessage } from '../errors.js';

const storedConfigSchema = z
  .object({
    client_id: z.string().min(1),
    client_secret: z.string().min(1),
    authorization_code: z.string().optional(),
    code_verifier: z.string().optional(),
    access_token: z.string().optional(),
    refresh_token: z.string().optional(),
    expires_at: z.number().optional(),
    username: z.string().optional(),
  })
  .passthrough();

export type StoredConfig = z.infer<typeof storedConfigSchema>;

/**
 * Static client credentials supplied by the user
 */
export interface Credentials {
  clientId: string;
  clientSecret: string;
  authorizationCode?: string;
  codeVerifier?: string;
}

/**
 * Token fields as written to disk
 */
export interface TokenState {
  access_token: string;
  refresh_token?: string;
  expires_at: number; // Unix timestamp (seconds)
}

/**
 * Extract the client credentials from a loaded config
 */
export function credentialsOf(config: StoredConfig): Credentials {
  return {
    clientId: config.client_id,
    clientSecret: config.client_secret,
    authorizationCode: config.authorization_code || undefined,
    codeVerifier: config.code_verifier || undefined,
  };
}

export class ConfigStore {
  constructor(public readonly path: string) {}

  /**
   * Read and validate the config file
   */
  async load(): Promise<StoredConfig> {
    const raw = await this.readRaw();
    const result = storedConfigSchema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.issues
        .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ConfigError(`Invalid config file ${this.path}: ${issues}`, this.path);
    }
    return result.data;
  }

  /**
   * Overwrite the token fields, keeping every other field in the file
   */
  async save(token: TokenState): Promise<void> {
    const current = await this.readRaw();
    if (typeof current !== 'object' || current === null || Array.isArray(current)) {
      throw new ConfigError(`Config file ${this.path} is not a JSON object`, this.path);
    }

    const next: Record<string, unknown> = {
      ...current,
      access_token: token.access_token,
      expires_at: token.expires_at,
    };
    if (token.refresh_token) {
      next.refresh_token = token.refresh_token;
    }

    try {
      await writeFile(this.path, `${JSON.stringify(next, null, 2)}\n`, 'utf-8');
    } catch (error) {
      throw new ConfigError(
        `Failed to write config file ${this.path}: ${errorMessage(error)}`,
        this.path,
        { cause: error }
      );
    }
  }

  private async readRaw(): Promise<unknown> {
    let text: string;
    try {
      text = await readFile(this.path, 'utf-8');
    } catch (error) {
      throw new ConfigError(
        `Failed to read config file ${this.path}: ${errorMessage(error)}`,
        this.path,
        { cause: error }
      );
    }

    try {
      return JSON.parse(text) as unknown;
    } catch (error) {
      throw new ConfigError(
        `Config file ${this.path} is not valid JSON: ${errorMessage(error)}`,
        this.path,
        { cause: error }
      );
    }
  }
}
