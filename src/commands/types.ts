import type { TrelloClient } from '../api/client.js';
import type { Flags } from '../args.js';
import type { Env, FsLike } from '../config.js';
import type { Logger } from '../logger.js';
import type { Output } from '../output/output.js';

/** Everything an invocation may touch besides stdout. */
export type Session = {
  env: Env;
  fs: FsLike;
  configPath: string;
  logger: Logger;
  createClient(apiKey: string, apiToken: string): TrelloClient;
};

export type CommandContext = {
  client: TrelloClient;
  out: Output;
  /** Arguments after `<group> <subcommand>`. */
  args: string[];
  flags: Flags;
};

/** Context for commands that manage credentials and must run without them. */
export type LocalContext = {
  session: Session;
  out: Output;
  args: string[];
  flags: Flags;
};

export type Command<Ctx = CommandContext> = {
  usage: string;
  /** Positionals the command accepts; more is a usage error before anything runs. */
  maxArgs: number;
  summary: string;
  run(ctx: Ctx): Promise<void>;
};

type GroupBase<Ctx> = {
  name: string;
  summary: string;
  commands: Readonly<Record<string, Command<Ctx>>>;
  /** Subcommand used when only the group name is given. */
  defaultCommand?: string;
  /**
   * Single-command group: every positional after the group name is an
   * argument of `defaultCommand` (`trello search <query>`).
   */
  bare?: boolean;
};

export type CommandGroup = GroupBase<CommandContext> & { local?: false };

export type LocalCommandGroup = GroupBase<LocalContext> & { local: true };

export type AnyGroup = CommandGroup | LocalCommandGroup;
