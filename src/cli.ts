import * as fs from 'node:fs/promises';

import { TrelloClient } from './api/client.js';
import { isCliFailure } from './api/errors.js';
import { boolFlag, expectArgs, parseArgs, type Flags } from './args.js';
import { authGroup } from './commands/auth.js';
import { boardsGroup } from './commands/boards.js';
import { cardsGroup } from './commands/cards.js';
import { checklistsGroup } from './commands/checklists.js';
import { infoGroup } from './commands/info.js';
import { labelsGroup } from './commands/labels.js';
import { listsGroup } from './commands/lists.js';
import { membersGroup } from './commands/members.js';
import { searchGroup } from './commands/search.js';
import type { AnyGroup, Session } from './commands/types.js';
import { defaultConfigPath, type Env, type FsLike } from './config.js';
import { resolveCredentials } from './credentials.js';
import { createLogger, resolveLogLevel, type Logger } from './logger.js';
import { formatError, formatKeyValue } from './output/format.js';
import { resolveOutputMode } from './output/mode.js';
import { Output } from './output/output.js';

export const VERSION = '0.1.0';

export type CliIo = {
  stdout: { write(chunk: string): void; isTTY?: boolean };
  stderr: { write(chunk: string): void };
};

/** Process-level collaborators; tests replace them to run in process. */
export type CliDeps = {
  env?: Env;
  fs?: FsLike;
  configPath?: string;
  logger?: Logger;
  createClient?: (apiKey: string, apiToken: string) => TrelloClient;
};

export const GROUPS: readonly AnyGroup[] = [
  authGroup,
  infoGroup(VERSION),
  boardsGroup,
  listsGroup,
  cardsGroup,
  membersGroup,
  checklistsGroup,
  labelsGroup,
  searchGroup,
];

function writeHelp(io: CliIo): void {
  io.stdout.write(
    [
      'trello: command-line client for Trello',
      '',
      'Usage:',
      '  trello <group> <command> [arguments] [flags]',
      '',
      'Groups:',
      formatKeyValue(GROUPS.map((g): [string, string] => [`  ${g.name}`, g.summary])).trimEnd(),
      '',
      'Global flags:',
      '  --json      JSON output (the default when stdout is not a terminal)',
      '  --pretty    indented JSON output',
      '  --verbose   log each request to stderr',
      '  -h, --help  show help',
      '',
      'Run `trello <group> help` for the commands of a group.',
      '',
    ].join('\n'),
  );
}

function writeGroupHelp(io: CliIo, group: AnyGroup): void {
  const commands = Object.values<{ usage: string; summary: string }>(group.commands);
  io.stdout.write(
    [
      `trello ${group.name}: ${group.summary}`,
      '',
      'Commands:',
      formatKeyValue(commands.map((c): [string, string] => [`  trello ${c.usage}`, c.summary])).trimEnd(),
      '',
    ].join('\n'),
  );
}

function writeUnknown(io: CliIo, what: string): number {
  io.stderr.write(formatError(`unknown ${what}`));
  io.stderr.write("Run 'trello help' for usage.\n");
  return 2;
}

type Dispatch =
  | { kind: 'help'; group?: AnyGroup }
  | { kind: 'unknown'; what: string }
  | { kind: 'run'; group: AnyGroup; sub: string; args: string[] };

function route(positionals: readonly string[], flags: Flags): Dispatch {
  const [name, ...rest] = positionals;
  if (name === undefined || name === 'help') {
    const group = GROUPS.find((g) => g.name === rest[0]);
    return { kind: 'help', group };
  }

  const group = GROUPS.find((g) => g.name === name);
  if (!group) return { kind: 'unknown', what: `command "${name}"` };
  if (boolFlag(flags, 'help') || rest[0] === 'help') return { kind: 'help', group };

  if (group.bare && group.defaultCommand) {
    return { kind: 'run', group, sub: group.defaultCommand, args: rest };
  }

  const [sub = group.defaultCommand, ...args] = rest;
  if (sub === undefined) return { kind: 'help', group };
  if (!Object.hasOwn(group.commands, sub)) {
    return { kind: 'unknown', what: `command "${sub}" for "trello ${group.name}"` };
  }
  return { kind: 'run', group, sub, args };
}

export async function runCli(
  argv: string[],
  io: CliIo = { stdout: process.stdout, stderr: process.stderr },
  deps: CliDeps = {},
): Promise<number> {
  const env = deps.env ?? process.env;
  let logger: Logger | undefined = deps.logger;

  try {
    const { positionals, flags } = parseArgs(argv);
    const dispatch = route(positionals, flags);

    if (dispatch.kind === 'help') {
      if (dispatch.group) writeGroupHelp(io, dispatch.group);
      else writeHelp(io);
      return 0;
    }
    if (dispatch.kind === 'unknown') return writeUnknown(io, dispatch.what);

    const out = new Output(
      io.stdout,
      resolveOutputMode({
        json: boolFlag(flags, 'json'),
        pretty: boolFlag(flags, 'pretty'),
        interactive: io.stdout.isTTY === true,
      }),
    );
    const log = logger ?? createLogger({ level: resolveLogLevel({ verbose: boolFlag(flags, 'verbose'), env }) });
    logger = log;

    const session: Session = {
      env,
      fs: deps.fs ?? fs,
      configPath: deps.configPath ?? defaultConfigPath({ env }),
      logger: log,
      createClient: deps.createClient ?? ((apiKey, apiToken) => new TrelloClient(apiKey, apiToken, { logger: log })),
    };

    const { group, sub, args } = dispatch;
    log.debug({ group: group.name, command: sub }, 'dispatch');

    if (group.local === true) {
      const command = group.commands[sub];
      expectArgs(args, command.maxArgs, command.usage);
      await command.run({ session, out, args, flags });
      return 0;
    }

    const command = group.commands[sub];
    expectArgs(args, command.maxArgs, command.usage);
    const creds = await resolveCredentials({ env, fs: session.fs, configPath: session.configPath });
    log.debug({ source: creds.source }, 'credentials resolved');

    await command.run({ client: session.createClient(creds.apiKey, creds.apiToken), out, args, flags });
    return 0;
  } catch (err) {
    logger?.debug({ kind: isCliFailure(err) ? err.kind : 'internal' }, 'command failed');
    io.stderr.write(formatError(err));
    return 1;
  }
}
