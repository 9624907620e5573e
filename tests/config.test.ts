import * as path from 'node:path';

import { describe, expect, it } from 'vitest';

import { clearStoredConfig, defaultConfigPath, loadStoredConfig, saveStoredConfig } from '../src/config.js';
import { ValidationError } from '../src/api/errors.js';
import { checkCredentialShape, resolveCredentials } from '../src/credentials.js';
import { runSetup } from '../src/setup.js';
import { createMemoryFs } from './fakes.js';

const CONFIG_PATH = '/home/test/.config/trello/config.json';

describe('defaultConfigPath', () => {
  it('uses Application Support on macOS', () => {
    expect(defaultConfigPath({ env: {}, platform: 'darwin', home: '/Users/test' })).toBe(
      path.join('/Users/test', 'Library', 'Application Support', 'trello', 'config.json'),
    );
  });

  it('honours an absolute XDG_CONFIG_HOME', () => {
    expect(defaultConfigPath({ env: { XDG_CONFIG_HOME: '/xdg' }, platform: 'linux', home: '/home/test' })).toBe(
      path.join('/xdg', 'trello', 'config.json'),
    );
  });

  it('ignores a relative XDG_CONFIG_HOME', () => {
    expect(defaultConfigPath({ env: { XDG_CONFIG_HOME: 'rel' }, platform: 'linux', home: '/home/test' })).toBe(
      path.join('/home/test', '.config', 'trello', 'config.json'),
    );
  });
});

describe('stored config', () => {
  it('treats a missing file as empty', async () => {
    const fs = createMemoryFs();
    await expect(loadStoredConfig({ fs, path: CONFIG_PATH })).resolves.toEqual({ api_key: '', api_token: '' });
  });

  it('rejects a file that is not JSON', async () => {
    const fs = createMemoryFs({ [CONFIG_PATH]: 'not json' });
    await expect(loadStoredConfig({ fs, path: CONFIG_PATH })).rejects.toThrow(`failed to load config ${CONFIG_PATH}:`);
  });

  it('rejects a file of the wrong shape', async () => {
    const fs = createMemoryFs({ [CONFIG_PATH]: '{"api_key":42}' });
    await expect(loadStoredConfig({ fs, path: CONFIG_PATH })).rejects.toThrow(
      `failed to load config ${CONFIG_PATH}: api_key: Expected string, received number`,
    );
  });

  it('saves pretty JSON with owner-only permissions and reads it back', async () => {
    const fs = createMemoryFs();
    const config = { api_key: 'test-key-1234', api_token: 'test-token-5678', username: 'tester' };

    await saveStoredConfig({ fs, path: CONFIG_PATH, config });

    expect(fs.dirs).toEqual([path.dirname(CONFIG_PATH)]);
    expect(fs.modes.get(CONFIG_PATH)).toBe(0o600);
    expect(fs.files.get(CONFIG_PATH)).toBe(`${JSON.stringify(config, null, 2)}\n`);
    await expect(loadStoredConfig({ fs, path: CONFIG_PATH })).resolves.toEqual(config);
  });

  it('clear removes the file and tolerates a missing one', async () => {
    const fs = createMemoryFs({ [CONFIG_PATH]: '{}' });
    await clearStoredConfig({ fs, path: CONFIG_PATH });
    await clearStoredConfig({ fs, path: CONFIG_PATH });
    expect(fs.files.has(CONFIG_PATH)).toBe(false);
  });
});

describe('resolveCredentials', () => {
  const stored = JSON.stringify({ api_key: 'test-config-key', api_token: 'test-config-token' });

  it('prefers env vars when both are set', async () => {
    const fs = createMemoryFs({ [CONFIG_PATH]: stored });
    const creds = await resolveCredentials({
      env: { TRELLO_API_KEY: 'test-env-key', TRELLO_API_TOKEN: 'test-env-token' },
      fs,
      configPath: CONFIG_PATH,
    });
    expect(creds).toEqual({ apiKey: 'test-env-key', apiToken: 'test-env-token', source: 'env' });
  });

  it('falls back to the config file when only one env var is set', async () => {
    const fs = createMemoryFs({ [CONFIG_PATH]: stored });
    const creds = await resolveCredentials({ env: { TRELLO_API_KEY: 'test-env-key' }, fs, configPath: CONFIG_PATH });
    expect(creds).toEqual({ apiKey: 'test-config-key', apiToken: 'test-config-token', source: 'config' });
  });

  it('fails with setup instructions when nothing is configured', async () => {
    const fs = createMemoryFs();
    const err = await resolveCredentials({ env: {}, fs, configPath: CONFIG_PATH }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ValidationError);
    expect(err).toMatchObject({ message: expect.stringMatching(/^not authenticated: run `trello auth setup/) });
  });
});

describe('checkCredentialShape', () => {
  it('rejects keys and tokens shorter than 8 characters', () => {
    expect(() => checkCredentialShape('short', 'long-enough-token')).toThrow(/^API key looks too short/);
    expect(() => checkCredentialShape('long-enough-key', 'tiny')).toThrow(/^API token looks too short/);
    expect(() => checkCredentialShape('12345678', '12345678')).not.toThrow();
  });
});

describe('runSetup', () => {
  const member = { id: 'm1', fullName: 'Test User', username: 'testuser' };

  it('does not validate or write obviously malformed credentials', async () => {
    const fs = createMemoryFs();
    let calls = 0;
    await expect(
      runSetup({
        fs,
        configPath: CONFIG_PATH,
        apiKey: 'abc',
        apiToken: 'test-token-5678',
        validate: async () => {
          calls++;
          return member;
        },
      }),
    ).rejects.toThrow(/API key looks too short/);
    expect(calls).toBe(0);
    expect(fs.files.size).toBe(0);
  });

  it('fails hard and writes nothing when validation fails', async () => {
    const fs = createMemoryFs();
    await expect(
      runSetup({
        fs,
        configPath: CONFIG_PATH,
        apiKey: 'test-key-1234',
        apiToken: 'test-token-5678',
        validate: async () => {
          throw new Error('HTTP 401: invalid key');
        },
      }),
    ).rejects.toThrow('credentials validation failed: HTTP 401: invalid key');
    expect(fs.files.has(CONFIG_PATH)).toBe(false);
  });

  it('writes credentials and the member after successful validation', async () => {
    const fs = createMemoryFs();
    const seen: string[] = [];

    const { config } = await runSetup({
      fs,
      configPath: CONFIG_PATH,
      apiKey: ' test-key-1234 ',
      apiToken: 'test-token-5678',
      validate: async (key, token) => {
        seen.push(key, token);
        return member;
      },
    });

    expect(seen).toEqual(['test-key-1234', 'test-token-5678']);
    expect(config).toEqual({
      api_key: 'test-key-1234',
      api_token: 'test-token-5678',
      member_id: 'm1',
      full_name: 'Test User',
      username: 'testuser',
    });
    expect(JSON.parse(fs.files.get(CONFIG_PATH) ?? '')).toEqual(config);
  });
});
