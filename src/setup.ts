import { errorMessage, ValidationError } from './api/errors.js';
import type { Member } from './api/types.js';
import { saveStoredConfig, type FsLike, type StoredConfig } from './config.js';
import { checkCredentialShape } from './credentials.js';

/**
 * Store a key/token pair after proving it works.
 *
 * Nothing is written unless `validate` (normally `GET /members/me` with the
 * new credentials) succeeds; the member it returns is cached in the config
 * so `auth status` can show who is logged in without a request.
 */
export async function runSetup(opts: {
  fs: Pick<FsLike, 'writeFile' | 'mkdir'>;
  configPath: string;
  apiKey: string;
  apiToken: string;
  validate: (apiKey: string, apiToken: string) => Promise<Member>;
}): Promise<{ config: StoredConfig; member: Member }> {
  const apiKey = opts.apiKey.trim();
  const apiToken = opts.apiToken.trim();
  checkCredentialShape(apiKey, apiToken);

  let member: Member;
  try {
    member = await opts.validate(apiKey, apiToken);
  } catch (err) {
    throw new ValidationError(`credentials validation failed: ${errorMessage(err)}`, { cause: err });
  }

  const config: StoredConfig = {
    api_key: apiKey,
    api_token: apiToken,
    member_id: member.id,
    full_name: member.fullName,
    username: member.username,
  };
  await saveStoredConfig({ fs: opts.fs, path: opts.configPath, config });
  return { config, member };
}
