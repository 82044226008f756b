/**
 * ConfigStore Tests
 */

import { describe, it, expect, afterEach } from '@jest/globals';
import { readFile } from 'fs/promises';
import { ConfigStore, credentialsOf } from '../src/config/index.js';
import { ConfigError } from '../src/errors.js';
import { readConfig, removeTempConfigs, tempConfigPath, writeTempConfig } from './configFile.js';

const baseConfig = {
  client_id: 'test-client-id',
  client_secret: 'test-client-secret',
  authorization_code: 'test-code',
  code_verifier: 'test-verifier',
};

afterEach(async () => {
  await removeTempConfigs();
});

describe('ConfigStore', () => {
  describe('load', () => {
    it('should load credentials and token state', async () => {
      const file = await writeTempConfig({
        ...baseConfig,
        access_token: 'test-access',
        refresh_token: 'test-refresh',
        expires_at: 1700000000,
      });

      const config = await new ConfigStore(file).load();

      expect(config.client_id).toBe('test-client-id');
      expect(config.access_token).toBe('test-access');
      expect(config.refresh_token).toBe('test-refresh');
      expect(config.expires_at).toBe(1700000000);
    });

    it('should load a first-run config without token fields', async () => {
      const file = await writeTempConfig(baseConfig);
      const config = await new ConfigStore(file).load();

      expect(config.access_token).toBeUndefined();
      expect(credentialsOf(config)).toEqual({
        clientId: 'test-client-id',
        clientSecret: 'test-client-secret',
        authorizationCode: 'test-code',
        codeVerifier: 'test-verifier',
      });
    });

    it('should throw ConfigError when the file is missing', async () => {
      const file = await tempConfigPath();
      await expect(new ConfigStore(file).load()).rejects.toThrow(ConfigError);
    });

    it('should throw ConfigError on invalid JSON', async () => {
      const file = await writeTempConfig('{ not json');
      await expect(new ConfigStore(file).load()).rejects.toThrow('is not valid JSON');
    });

    it('should throw ConfigError when client credentials are missing', async () => {
      const file = await writeTempConfig({ client_id: 'test-client-id' });
      await expect(new ConfigStore(file).load()).rejects.toThrow('client_secret');
    });

    it('should treat empty code fields as absent', async () => {
      const file = await writeTempConfig({ ...baseConfig, authorization_code: '', code_verifier: '' });
      const credentials = credentialsOf(await new ConfigStore(file).load());

      expect(credentials.authorizationCode).toBeUndefined();
      expect(credentials.codeVerifier).toBeUndefined();
    });
  });

  describe('save', () => {
    it('should overwrite token fields and keep everything else', async () => {
      const file = await writeTempConfig({
        ...baseConfig,
        username: 'alice',
        custom: { nested: true },
        access_token: 'old-access',
        refresh_token: 'old-refresh',
        expires_at: 1,
      });

      await new ConfigStore(file).save({
        access_token: 'new-access',
        refresh_token: 'new-refresh',
        expires_at: 1700003600,
      });

      expect(await readConfig(file)).toEqual({
        ...baseConfig,
        username: 'alice',
        custom: { nested: true },
        access_token: 'new-access',
        refresh_token: 'new-refresh',
        expires_at: 1700003600,
      });
    });

    it('should keep the stored refresh token when none is given', async () => {
      const file = await writeTempConfig({ ...baseConfig, refresh_token: 'old-refresh' });

      await new ConfigStore(file).save({ access_token: 'new-access', expires_at: 5 });

      expect(await readConfig(file)).toEqual({
        ...baseConfig,
        refresh_token: 'old-refresh',
        access_token: 'new-access',
        expires_at: 5,
      });
    });

    it('should write pretty-printed JSON', async () => {
      const file = await writeTempConfig({ client_id: 'a', client_secret: 'b' });

      await new ConfigStore(file).save({ access_token: 'c', expires_at: 1 });

      expect(await readFile(file, 'utf-8')).toBe(
        '{\n  "client_id": "a",\n  "client_secret": "b",\n  "access_token": "c",\n  "expires_at": 1\n}\n'
      );
    });

    it('should throw ConfigError when the file is missing', async () => {
      const file = await tempConfigPath();
      const store = new ConfigStore(file);

      await expect(store.save({ access_token: 'x', expires_at: 1 })).rejects.toThrow(ConfigError);
    });

    it('should throw ConfigError when the file is not an object', async () => {
      const file = await writeTempConfig('[1, 2]');
      const store = new ConfigStore(file);

      await expect(store.save({ access_token: 'x', expires_at: 1 })).rejects.toThrow('is not a JSON object');
    });
  });
});
