import { ValidationError } from './api/errors.js';
import { loadStoredConfig, type Env, type FsLike, type StoredConfig } from './config.js';

export type Credentials = {
  apiKey: string;
  apiToken: string;
  source: 'env' | 'config';
};

export const MIN_CREDENTIAL_LENGTH = 8;

export const NOT_AUTHENTICATED_MESSAGE = [
  'not authenticated: run `trello auth setup <api-key> <api-token>`',
  'or set TRELLO_API_KEY and TRELLO_API_TOKEN env vars',
].join('\n');

export function credentialsFromEnv(env: Env): Credentials | undefined {
  const apiKey = env.TRELLO_API_KEY ?? '';
  const apiToken = env.TRELLO_API_TOKEN ?? '';
  if (!apiKey || !apiToken) return undefined;
  return { apiKey, apiToken, source: 'env' };
}

export function credentialsFromConfig(config: StoredConfig): Credentials | undefined {
  if (!config.api_key || !config.api_token) return undefined;
  return { apiKey: config.api_key, apiToken: config.api_token, source: 'config' };
}

/** Env vars (both set) first, then the config file. */
export async function resolveCredentials(opts: {
  env: Env;
  fs: Pick<FsLike, 'readFile'>;
  configPath: string;
}): Promise<Credentials> {
  const fromEnv = credentialsFromEnv(opts.env);
  if (fromEnv) return fromEnv;

  const config = await loadStoredConfig({ fs: opts.fs, path: opts.configPath });
  const fromConfig = credentialsFromConfig(config);
  if (fromConfig) return fromConfig;

  throw new ValidationError(NOT_AUTHENTICATED_MESSAGE);
}

/** Length check done before `auth setup` spends a request on obviously wrong input. */
export function checkCredentialShape(apiKey: string, apiToken: string): void {
  if (apiKey.length < MIN_CREDENTIAL_LENGTH) {
    throw new ValidationError('API key looks too short: check your key at https://trello.com/power-ups/admin');
  }
  if (apiToken.length < MIN_CREDENTIAL_LENGTH) {
    throw new ValidationError(
      `API token looks too short: re-generate it at https://trello.com/1/authorize?expiration=never&scope=read,write&response_type=token&key=${apiKey}`,
    );
  }
}
