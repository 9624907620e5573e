import { errorMessage } from '../api/errors.js';
import { loadStoredConfig } from '../config.js';
import { maskSecret } from '../output/format.js';
import type { LocalCommandGroup, Session } from './types.js';

export type ToolInfo = {
  version: string;
  node: string;
  platform: string;
  config_path: string;
  key_source: string;
  env: { TRELLO_API_KEY: string; TRELLO_API_TOKEN: string };
};

async function keySource(session: Session): Promise<string> {
  if (session.env.TRELLO_API_KEY) return 'TRELLO_API_KEY env var';
  try {
    const stored = await loadStoredConfig({ fs: session.fs, path: session.configPath });
    return stored.api_key ? 'config file' : '(not set)';
  } catch (err) {
    return `(config unreadable: ${errorMessage(err)})`;
  }
}

function infoLines(info: ToolInfo): string[] {
  return [
    'trello: command-line client for Trello',
    '',
    `  version: ${info.version}`,
    `  node:    ${info.node}`,
    `  os/arch: ${info.platform}`,
    '',
    '  config paths by OS:',
    '    macOS:    ~/Library/Application Support/trello/config.json',
    '    Linux:    ~/.config/trello/config.json',
    '    Windows:  %AppData%\\trello\\config.json',
    `  config:   ${info.config_path}`,
    '',
    `  key source:   ${info.key_source}`,
    '',
    '  env vars:',
    `    TRELLO_API_KEY   = ${info.env.TRELLO_API_KEY}`,
    `    TRELLO_API_TOKEN = ${info.env.TRELLO_API_TOKEN}`,
    '',
    '  credential resolution order:',
    '    1. TRELLO_API_KEY + TRELLO_API_TOKEN env vars',
    '    2. config file  (trello auth setup)',
  ];
}

export function infoGroup(version: string): LocalCommandGroup {
  return {
    name: 'info',
    summary: 'Show config path, credential source and environment',
    local: true,
    defaultCommand: 'show',
    bare: true,
    commands: {
      show: {
        usage: 'info',
        maxArgs: 0,
        summary: 'Show config path, credential source and environment',
        async run({ session, out }) {
          const info: ToolInfo = {
            version,
            node: process.version,
            platform: `${process.platform}/${process.arch}`,
            config_path: session.configPath,
            key_source: await keySource(session),
            env: {
              TRELLO_API_KEY: maskSecret(session.env.TRELLO_API_KEY),
              TRELLO_API_TOKEN: maskSecret(session.env.TRELLO_API_TOKEN),
            },
          };
          out.lines(info, infoLines);
        },
      },
    },
  };
}
