import { ValidationError } from '../api/errors.js';
import { mergeParams } from '../api/params.js';
import { closedFlag, requireArg, stringFlag } from '../args.js';
import { formatBool, formatTime, truncate } from '../output/format.js';
import type { CommandGroup } from './types.js';
import { boardsView, cardsView, deletedResult, labelsView, listsView, membersView } from './views.js';

const PRIVACY_LEVELS = ['private', 'public', 'org'] as const;

export const boardsGroup: CommandGroup = {
  name: 'boards',
  summary: 'Manage boards',
  defaultCommand: 'list',
  commands: {
    list: {
      usage: 'boards list [--filter open|closed|all|members|organization|public|starred]',
      maxArgs: 0,
      summary: 'List boards for the authenticated member',
      async run({ client, out, flags }) {
        const boards = await client.getMyBoards(stringFlag(flags, 'filter') ?? 'open');
        out.list(boards, boardsView);
      },
    },

    get: {
      usage: 'boards get <board-id>',
      maxArgs: 1,
      summary: 'Show one board',
      async run({ client, out, args }) {
        const board = await client.getBoard(requireArg(args, 0, 'board-id'));
        out.detail(board, (b) => [
          ['ID', b.id],
          ['Name', b.name ?? ''],
          ['Description', truncate(b.desc ?? '', 80)],
          ['Workspace', b.idOrganization ?? ''],
          ['URL', b.shortUrl ?? ''],
          ['Last Activity', formatTime(b.dateLastActivity)],
          ['Closed', formatBool(b.closed)],
          ['Permission', b.prefs?.permissionLevel ?? ''],
        ]);
      },
    },

    create: {
      usage: 'boards create <name> [--desc <text>] [--workspace <id>] [--privacy private|public|org]',
      maxArgs: 1,
      summary: 'Create a board',
      async run({ client, out, args, flags }) {
        const name = requireArg(args, 0, 'name');
        const privacy = stringFlag(flags, 'privacy');
        if (privacy && !(PRIVACY_LEVELS as readonly string[]).includes(privacy)) {
          throw new ValidationError(`--privacy must be one of: ${PRIVACY_LEVELS.join(', ')}`);
        }

        const board = await client.createBoard({
          name,
          desc: stringFlag(flags, 'desc'),
          idOrganization: stringFlag(flags, 'workspace'),
          permissionLevel: privacy,
        });
        out.lines(board, (b) => [`Board created: ${b.name ?? ''}`, `ID:  ${b.id}`, `URL: ${b.shortUrl ?? ''}`]);
      },
    },

    update: {
      usage: 'boards update <board-id> [--name <name>] [--desc <text>] [--closed | --open]',
      maxArgs: 1,
      summary: "Update a board's name, description or state",
      async run({ client, out, args, flags }) {
        const id = requireArg(args, 0, 'board-id');
        const params = mergeParams(
          { name: stringFlag(flags, 'name'), desc: stringFlag(flags, 'desc') },
          { closed: closedFlag(flags) },
        );
        if (Object.keys(params).length === 0) {
          throw new ValidationError('nothing to update: pass --name, --desc, --closed or --open');
        }

        const board = await client.updateBoard(id, params);
        out.lines(board, (b) => [`Board updated: ${b.name ?? ''}`, `ID:  ${b.id}`, `URL: ${b.shortUrl ?? ''}`]);
      },
    },

    delete: {
      usage: 'boards delete <board-id>',
      maxArgs: 1,
      summary: 'Permanently delete a board',
      async run({ client, out, args }) {
        const id = requireArg(args, 0, 'board-id');
        await client.deleteBoard(id);
        out.lines(deletedResult(id), (r) => [`Board ${r.id} deleted.`]);
      },
    },

    members: {
      usage: 'boards members <board-id>',
      maxArgs: 1,
      summary: 'List members of a board',
      async run({ client, out, args }) {
        out.list(await client.getBoardMembers(requireArg(args, 0, 'board-id')), membersView);
      },
    },

    labels: {
      usage: 'boards labels <board-id>',
      maxArgs: 1,
      summary: 'List labels defined on a board',
      async run({ client, out, args }) {
        out.list(await client.getBoardLabels(requireArg(args, 0, 'board-id')), labelsView);
      },
    },

    lists: {
      usage: 'boards lists <board-id> [--filter open|closed|all]',
      maxArgs: 1,
      summary: 'List the lists (columns) of a board',
      async run({ client, out, args, flags }) {
        const lists = await client.getBoardLists(requireArg(args, 0, 'board-id'), stringFlag(flags, 'filter') ?? 'open');
        out.list(lists, listsView);
      },
    },

    cards: {
      usage: 'boards cards <board-id> [--filter open|closed|all|visible]',
      maxArgs: 1,
      summary: 'List cards on a board',
      async run({ client, out, args, flags }) {
        const cards = await client.getBoardCards(requireArg(args, 0, 'board-id'), stringFlag(flags, 'filter') ?? 'open');
        out.list(cards, cardsView());
      },
    },
  },
};
