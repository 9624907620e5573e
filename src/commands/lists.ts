import { requireArg, requireFlag, stringFlag } from '../args.js';
import { formatBool } from '../output/format.js';
import type { CommandGroup } from './types.js';
import { cardsView, listsView } from './views.js';

export const listsGroup: CommandGroup = {
  name: 'lists',
  summary: 'Manage lists (columns)',
  defaultCommand: 'list',
  commands: {
    list: {
      usage: 'lists list --board <board-id> [--filter open|closed|all]',
      maxArgs: 0,
      summary: 'List lists on a board',
      async run({ client, out, flags }) {
        const lists = await client.getBoardLists(requireFlag(flags, 'board'), stringFlag(flags, 'filter') ?? 'open');
        out.list(lists, listsView);
      },
    },

    get: {
      usage: 'lists get <list-id>',
      maxArgs: 1,
      summary: 'Show one list',
      async run({ client, out, args }) {
        const list = await client.getList(requireArg(args, 0, 'list-id'));
        out.detail(list, (l) => [
          ['ID', l.id],
          ['Name', l.name ?? ''],
          ['Board', l.idBoard ?? ''],
          ['Closed', formatBool(l.closed)],
        ]);
      },
    },

    create: {
      usage: 'lists create <name> --board <board-id> [--pos top|bottom|<number>]',
      maxArgs: 1,
      summary: 'Create a list on a board',
      async run({ client, out, args, flags }) {
        const name = requireArg(args, 0, 'name');
        const list = await client.createList({ name, idBoard: requireFlag(flags, 'board'), pos: stringFlag(flags, 'pos') });
        out.lines(list, (l) => [`List created: ${l.name ?? ''}`, `ID:    ${l.id}`, `Board: ${l.idBoard ?? ''}`]);
      },
    },

    rename: {
      usage: 'lists rename <list-id> <new-name>',
      maxArgs: 2,
      summary: 'Rename a list',
      async run({ client, out, args }) {
        const id = requireArg(args, 0, 'list-id');
        const list = await client.updateList(id, { name: requireArg(args, 1, 'new-name') });
        out.lines(list, (l) => [`List renamed to: ${l.name ?? ''}`]);
      },
    },

    archive: {
      usage: 'lists archive <list-id>',
      maxArgs: 1,
      summary: 'Archive a list; its cards are kept',
      async run({ client, out, args }) {
        const list = await client.archiveList(requireArg(args, 0, 'list-id'), true);
        out.lines(list, (l) => [`List archived: ${l.name ?? ''}`]);
      },
    },

    unarchive: {
      usage: 'lists unarchive <list-id>',
      maxArgs: 1,
      summary: 'Reopen an archived list',
      async run({ client, out, args }) {
        const list = await client.archiveList(requireArg(args, 0, 'list-id'), false);
        out.lines(list, (l) => [`List unarchived: ${l.name ?? ''}`]);
      },
    },

    cards: {
      usage: 'lists cards <list-id> [--filter open|closed|all]',
      maxArgs: 1,
      summary: 'List cards in a list',
      async run({ client, out, args, flags }) {
        const cards = await client.getListCards(requireArg(args, 0, 'list-id'), stringFlag(flags, 'filter') ?? 'open');
        out.list(cards, cardsView(50));
      },
    },
  },
};
