import { requireArg } from '../args.js';
import { clearStoredConfig, loadStoredConfig } from '../config.js';
import { credentialsFromConfig, credentialsFromEnv } from '../credentials.js';
import { maskSecret } from '../output/format.js';
import { runSetup } from '../setup.js';
import type { LocalCommandGroup } from './types.js';

type AuthStatus = {
  config_path: string;
  authenticated: boolean;
  source: 'env' | 'config' | null;
  api_key: string;
  api_token: string;
  username?: string;
  full_name?: string;
};

function statusLines(s: AuthStatus): string[] {
  const lines = [`Config: ${s.config_path}`, ''];
  if (s.source === 'env') {
    lines.push(
      'Credential source: env vars (take priority over config)',
      `TRELLO_API_KEY:   ${s.api_key}`,
      `TRELLO_API_TOKEN: ${s.api_token}`,
    );
  } else if (s.source === 'config') {
    lines.push('Credential source: config file', `API key:   ${s.api_key}`, `API token: ${s.api_token}`);
    if (s.full_name) lines.push(`User:      ${s.full_name} (@${s.username ?? ''})`);
  } else {
    lines.push(
      'Status: not authenticated',
      '',
      'Run: trello auth setup <api-key> <api-token>',
      'Or set env vars:',
      '  export TRELLO_API_KEY=your-key',
      '  export TRELLO_API_TOKEN=your-token',
    );
  }
  return lines;
}

export const authGroup: LocalCommandGroup = {
  name: 'auth',
  summary: 'Manage stored credentials',
  local: true,
  defaultCommand: 'status',
  commands: {
    setup: {
      usage: 'auth setup <api-key> <api-token>',
      maxArgs: 2,
      summary: 'Validate a key/token pair and save it to the config file',
      async run({ session, out, args }) {
        const { config, member } = await runSetup({
          fs: session.fs,
          configPath: session.configPath,
          apiKey: requireArg(args, 0, 'api-key'),
          apiToken: requireArg(args, 1, 'api-token'),
          validate: (key, token) => session.createClient(key, token).getMember('me'),
        });
        session.logger.info({ member: member.id }, 'credentials saved');

        const result = {
          config_path: session.configPath,
          member_id: member.id,
          full_name: member.fullName ?? '',
          username: member.username ?? '',
        };
        out.lines(result, (r) => [
          `Credentials saved to ${r.config_path}`,
          `Authenticated as: ${r.full_name} (@${r.username})`,
          `API key:          ${maskSecret(config.api_key)}`,
          `API token:        ${maskSecret(config.api_token)}`,
        ]);
      },
    },

    status: {
      usage: 'auth status',
      maxArgs: 0,
      summary: 'Show where credentials come from and who they belong to',
      async run({ session, out }) {
        const stored = await loadStoredConfig({ fs: session.fs, path: session.configPath });
        const creds = credentialsFromEnv(session.env) ?? credentialsFromConfig(stored);

        const status: AuthStatus = {
          config_path: session.configPath,
          authenticated: creds !== undefined,
          source: creds?.source ?? null,
          api_key: maskSecret(creds?.apiKey),
          api_token: maskSecret(creds?.apiToken),
        };
        if (creds?.source === 'config') {
          status.username = stored.username;
          status.full_name = stored.full_name;
        }
        out.lines(status, statusLines);
      },
    },

    logout: {
      usage: 'auth logout',
      maxArgs: 0,
      summary: 'Remove saved credentials from the config file',
      async run({ session, out }) {
        await clearStoredConfig({ fs: session.fs, path: session.configPath });
        out.lines({ config_path: session.configPath, removed: true }, () => [
          'Credentials removed from config.',
          'Set TRELLO_API_KEY and TRELLO_API_TOKEN env vars if you still need access.',
        ]);
      },
    },
  },
};
