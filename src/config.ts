import * as os from 'node:os';
import * as path from 'node:path';

import { z } from 'zod';

export const StoredConfigSchema = z.object({
  api_key: z.string().default(''),
  api_token: z.string().default(''),
  member_id: z.string().optional(),
  full_name: z.string().optional(),
  username: z.string().optional(),
});

export type StoredConfig = z.infer<typeof StoredConfigSchema>;

export type FsLike = {
  readFile(path: string, encoding: 'utf-8'): Promise<string>;
  writeFile(path: string, content: string, opts: { encoding: 'utf-8'; mode?: number }): Promise<void>;
  mkdir(path: string, opts: { recursive: boolean; mode?: number }): Promise<unknown>;
  rm(path: string, opts: { force: boolean }): Promise<void>;
};

export type Env = Readonly<Record<string, string | undefined>>;

/**
 * Per-user config file location:
 * - macOS:   ~/Library/Application Support/trello/config.json
 * - Windows: %AppData%\trello\config.json
 * - others:  $XDG_CONFIG_HOME/trello/config.json, else ~/.config/trello/config.json
 */
export function defaultConfigPath(
  opts: { env?: Env; platform?: NodeJS.Platform; home?: string } = {},
): string {
  const env = opts.env ?? process.env;
  const platform = opts.platform ?? process.platform;
  const home = opts.home ?? os.homedir();

  if (platform === 'darwin') {
    return path.join(home, 'Library', 'Application Support', 'trello', 'config.json');
  }
  if (platform === 'win32') {
    const appData = env.APPDATA || path.join(home, 'AppData', 'Roaming');
    return path.join(appData, 'trello', 'config.json');
  }
  const xdg = env.XDG_CONFIG_HOME;
  const base = xdg && path.isAbsolute(xdg) ? xdg : path.join(home, '.config');
  return path.join(base, 'trello', 'config.json');
}

function isMissingFile(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

/** A missing file is an empty config, not an error. */
export async function loadStoredConfig(opts: { fs: Pick<FsLike, 'readFile'>; path: string }): Promise<StoredConfig> {
  let text: string;
  try {
    text = await opts.fs.readFile(opts.path, 'utf-8');
  } catch (err) {
    if (isMissingFile(err)) return StoredConfigSchema.parse({});
    throw err;
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new Error(`failed to load config ${opts.path}: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
  }
  const parsed = StoredConfigSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`failed to load config ${opts.path}: ${issue?.path.join('.') || 'root'}: ${issue?.message ?? 'invalid'}`);
  }
  return parsed.data;
}

export async function saveStoredConfig(opts: {
  fs: Pick<FsLike, 'writeFile' | 'mkdir'>;
  path: string;
  config: StoredConfig;
}): Promise<void> {
  await opts.fs.mkdir(path.dirname(opts.path), { recursive: true, mode: 0o700 });
  await opts.fs.writeFile(opts.path, `${JSON.stringify(opts.config, null, 2)}\n`, { encoding: 'utf-8', mode: 0o600 });
}

export async function clearStoredConfig(opts: { fs: Pick<FsLike, 'rm'>; path: string }): Promise<void> {
  await opts.fs.rm(opts.path, { force: true });
}
