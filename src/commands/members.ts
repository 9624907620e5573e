import { requireArg, stringFlag } from '../args.js';
import type { Member } from '../api/types.js';
import { formatBool, formatDate, formatTime, truncate } from '../output/format.js';
import type { CommandGroup } from './types.js';

function target(args: readonly string[]): string {
  return args[0] ?? 'me';
}

function memberPairs(m: Member, withPrivate: boolean): Array<[string, string]> {
  const pairs: Array<[string, string]> = [
    ['ID', m.id],
    ['Full Name', m.fullName ?? ''],
    ['Username', m.username ?? ''],
  ];
  if (withPrivate) pairs.push(['Email', m.email ?? '']);
  pairs.push(['Bio', truncate(m.bio ?? '', 80)], ['URL', m.url ?? '']);
  if (withPrivate) pairs.push(['Boards', String(m.idBoards?.length ?? 0)]);
  return pairs;
}

export const membersGroup: CommandGroup = {
  name: 'members',
  summary: 'Look up members and what they belong to',
  defaultCommand: 'me',
  commands: {
    me: {
      usage: 'members me',
      maxArgs: 0,
      summary: 'Show the authenticated member',
      async run({ client, out }) {
        out.detail(await client.getMember('me'), (m) => memberPairs(m, true));
      },
    },

    get: {
      usage: 'members get <id-or-username>',
      maxArgs: 1,
      summary: 'Show a member by ID or username',
      async run({ client, out, args }) {
        out.detail(await client.getMember(requireArg(args, 0, 'id-or-username')), (m) => memberPairs(m, false));
      },
    },

    boards: {
      usage: 'members boards [id-or-username] [--filter open|closed|all|members|organization|public|starred]',
      maxArgs: 1,
      summary: 'List boards of a member (default: you)',
      async run({ client, out, args, flags }) {
        const who = target(args);
        const boards = await client.getMemberBoards(who, stringFlag(flags, 'filter') ?? 'open');
        out.list(boards, {
          empty: 'No boards found.',
          headers: ['ID', 'NAME', 'LAST ACTIVITY', 'CLOSED'],
          row: (b) => [b.id, truncate(b.name ?? '', 44), formatTime(b.dateLastActivity), formatBool(b.closed)],
        });
      },
    },

    cards: {
      usage: 'members cards [id-or-username] [--filter open|closed|all|visible]',
      maxArgs: 1,
      summary: 'List cards assigned to a member (default: you)',
      async run({ client, out, args, flags }) {
        const who = target(args);
        const cards = await client.getMemberCards(who, stringFlag(flags, 'filter') ?? 'open');
        out.list(cards, {
          empty: 'No cards found.',
          headers: ['ID', '#', 'NAME', 'BOARD', 'DUE'],
          row: (c) => [
            c.id,
            String(c.idShort ?? ''),
            truncate(c.name ?? '', 44),
            truncate(c.idBoard ?? '', 24),
            formatDate(c.due),
          ],
        });
      },
    },

    workspaces: {
      usage: 'members workspaces [id-or-username]',
      maxArgs: 1,
      summary: 'List workspaces of a member (default: you)',
      async run({ client, out, args }) {
        const orgs = await client.getMemberOrganizations(target(args));
        out.list(orgs, {
          empty: 'No workspaces found.',
          headers: ['ID', 'NAME', 'DISPLAY NAME', 'BOARDS'],
          row: (o) => [
            o.id,
            truncate(o.name ?? '', 24),
            truncate(o.displayName ?? '', 30),
            String(o.idBoards?.length ?? 0),
          ],
        });
      },
    },
  },
};
