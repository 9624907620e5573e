import { ValidationError } from '../api/errors.js';
import { CLEAR, mergeParams } from '../api/params.js';
import {
  boolFlag,
  changedBoolFlag,
  closedFlag,
  intFlag,
  listFlag,
  requireArg,
  requireFlag,
  stringFlag,
  type Flags,
} from '../args.js';
import { formatBool, formatDate, formatLabels, formatTime, labelNames, truncate } from '../output/format.js';
import type { CommandGroup } from './types.js';
import { cardsView, checklistLines, deletedResult } from './views.js';

type Assignment = { card: string; added?: string; removed?: string };

function assignmentFlags(flags: Flags, what: string): { add?: string; remove?: string } {
  const add = stringFlag(flags, 'add');
  const remove = stringFlag(flags, 'remove');
  if (!add && !remove) {
    throw new ValidationError(`provide --add <${what}-id> or --remove <${what}-id>`);
  }
  return { add, remove };
}

function assignmentLines(noun: string, r: Assignment): string[] {
  const lines: string[] = [];
  if (r.added) lines.push(`${noun} ${r.added} added to card ${r.card}.`);
  if (r.removed) lines.push(`${noun} ${r.removed} removed from card ${r.card}.`);
  return lines;
}

export const cardsGroup: CommandGroup = {
  name: 'cards',
  summary: 'Manage cards',
  commands: {
    list: {
      usage: 'cards list (--board <board-id> | --list <list-id>) [--filter open|closed|all|visible]',
      maxArgs: 0,
      summary: 'List cards on a board or in a list',
      async run({ client, out, flags }) {
        const listId = stringFlag(flags, 'list');
        const boardId = stringFlag(flags, 'board');
        const filter = stringFlag(flags, 'filter') ?? 'open';
        if (listId) {
          out.list(await client.getListCards(listId, filter), cardsView());
        } else if (boardId) {
          out.list(await client.getBoardCards(boardId, filter), cardsView());
        } else {
          throw new ValidationError('provide --board <board-id> or --list <list-id>');
        }
      },
    },

    get: {
      usage: 'cards get <card-id>',
      maxArgs: 1,
      summary: 'Show one card by ID or short link',
      async run({ client, out, args }) {
        const card = await client.getCard(requireArg(args, 0, 'card-id'));
        out.detail(card, (c) => {
          const badges = c.badges;
          const total = badges?.checkItems ?? 0;
          return [
            ['ID', c.id],
            ['#', String(c.idShort ?? '')],
            ['Name', c.name ?? ''],
            ['Description', truncate(c.desc ?? '', 80)],
            ['List', c.idList ?? ''],
            ['Board', c.idBoard ?? ''],
            ['URL', c.shortUrl ?? ''],
            ['Due', formatDate(c.due)],
            ['Due complete', formatBool(c.dueComplete)],
            ['Labels', formatLabels(labelNames(c.labels))],
            ['Checklists', total > 0 ? `${badges?.checkItemsChecked ?? 0}/${total}` : '-'],
            ['Attachments', String(badges?.attachments ?? 0)],
            ['Comments', String(badges?.comments ?? 0)],
            ['Last Activity', formatTime(c.dateLastActivity)],
            ['Closed', formatBool(c.closed)],
          ];
        });
      },
    },

    create: {
      usage: 'cards create <name> --list <list-id> [--desc <text>] [--due <date>] [--pos top|bottom|<number>] [--labels <id,id>]',
      maxArgs: 1,
      summary: 'Create a card in a list',
      async run({ client, out, args, flags }) {
        const name = requireArg(args, 0, 'name');
        const card = await client.createCard({
          idList: requireFlag(flags, 'list'),
          name,
          desc: stringFlag(flags, 'desc'),
          due: stringFlag(flags, 'due'),
          pos: stringFlag(flags, 'pos'),
          idLabels: listFlag(flags, 'labels'),
        });
        out.lines(card, (c) => [`Card created: ${c.name ?? ''}`, `ID:  ${c.id}`, `#${c.idShort ?? ''}  ${c.shortUrl ?? ''}`]);
      },
    },

    update: {
      usage:
        'cards update <card-id> [--name <name>] [--desc <text>] [--due <date> | --clear-due] [--closed | --open] [--due-complete[=false]]',
      maxArgs: 1,
      summary: 'Update fields of a card',
      async run({ client, out, args, flags }) {
        const id = requireArg(args, 0, 'card-id');
        const due = stringFlag(flags, 'due');
        const clearDue = boolFlag(flags, 'clear-due');
        if (due && clearDue) {
          throw new ValidationError('use either --due or --clear-due, not both');
        }

        const params = mergeParams(
          { name: stringFlag(flags, 'name'), desc: stringFlag(flags, 'desc'), due: clearDue ? CLEAR : due },
          { closed: closedFlag(flags), dueComplete: changedBoolFlag(flags, 'due-complete') },
        );
        if (Object.keys(params).length === 0) {
          throw new ValidationError('nothing to update: pass --name, --desc, --due, --clear-due, --closed, --open or --due-complete');
        }

        const card = await client.updateCard(id, params);
        out.lines(card, (c) => [`Card updated: ${c.name ?? ''}`, `ID:  ${c.id}`]);
      },
    },

    delete: {
      usage: 'cards delete <card-id>',
      maxArgs: 1,
      summary: 'Permanently delete a card',
      async run({ client, out, args }) {
        const id = requireArg(args, 0, 'card-id');
        await client.deleteCard(id);
        out.lines(deletedResult(id), (r) => [`Card ${r.id} deleted.`]);
      },
    },

    move: {
      usage: 'cards move <card-id> --list <list-id> [--board <board-id>]',
      maxArgs: 1,
      summary: 'Move a card to another list, optionally on another board',
      async run({ client, out, args, flags }) {
        const id = requireArg(args, 0, 'card-id');
        const card = await client.moveCard(id, requireFlag(flags, 'list'), stringFlag(flags, 'board'));
        out.lines(card, (c) => [`Card moved: ${c.name ?? ''}`, `New list: ${c.idList ?? ''}`]);
      },
    },

    archive: {
      usage: 'cards archive <card-id>',
      maxArgs: 1,
      summary: 'Archive a card',
      async run({ client, out, args }) {
        const card = await client.updateCard(requireArg(args, 0, 'card-id'), { closed: true });
        out.lines(card, (c) => [`Card archived: ${c.name ?? ''}`]);
      },
    },

    comment: {
      usage: 'cards comment <card-id> <text>',
      maxArgs: 2,
      summary: 'Add a comment to a card',
      async run({ client, out, args }) {
        const id = requireArg(args, 0, 'card-id');
        const action = await client.addComment(id, requireArg(args, 1, 'text'));
        out.lines(action, (a) => [`Comment added to card ${id}.`, `Action ID: ${a.id}`]);
      },
    },

    comments: {
      usage: 'cards comments <card-id> [--limit <n>]',
      maxArgs: 1,
      summary: 'List comments on a card, newest first',
      async run({ client, out, args, flags }) {
        const comments = await client.getCardComments(requireArg(args, 0, 'card-id'), intFlag(flags, 'limit', 0));
        out.list(comments, {
          empty: 'No comments found.',
          headers: ['ID', 'DATE', 'AUTHOR', 'TEXT'],
          row: (a) => [
            a.id,
            formatTime(a.date),
            a.memberCreator?.username ?? a.idMemberCreator ?? '',
            truncate((a.data?.text ?? '').replace(/\s+/g, ' '), 60),
          ],
        });
      },
    },

    checklists: {
      usage: 'cards checklists <card-id>',
      maxArgs: 1,
      summary: 'List checklists on a card with their items',
      async run({ client, out, args }) {
        const checklists = await client.getCardChecklists(requireArg(args, 0, 'card-id'));
        out.lines(checklists, (all) =>
          all.length === 0 ? ['No checklists found.'] : all.flatMap((cl) => ['', ...checklistLines(cl)]),
        );
      },
    },

    attachments: {
      usage: 'cards attachments <card-id>',
      maxArgs: 1,
      summary: 'List attachments on a card',
      async run({ client, out, args }) {
        const attachments = await client.getCardAttachments(requireArg(args, 0, 'card-id'));
        out.list(attachments, {
          empty: 'No attachments found.',
          headers: ['ID', 'NAME', 'URL', 'DATE'],
          row: (a) => [a.id, truncate(a.name ?? '', 30), truncate(a.url ?? '', 50), formatTime(a.date)],
        });
      },
    },

    label: {
      usage: 'cards label <card-id> (--add <label-id> | --remove <label-id>)',
      maxArgs: 1,
      summary: 'Add or remove a label on a card',
      async run({ client, out, args, flags }) {
        const card = requireArg(args, 0, 'card-id');
        const { add, remove } = assignmentFlags(flags, 'label');
        if (add) await client.addLabelToCard(card, add);
        if (remove) await client.removeLabelFromCard(card, remove);
        out.lines<Assignment>({ card, added: add, removed: remove }, (r) => assignmentLines('Label', r));
      },
    },

    member: {
      usage: 'cards member <card-id> (--add <member-id> | --remove <member-id>)',
      maxArgs: 1,
      summary: 'Assign or unassign a member on a card',
      async run({ client, out, args, flags }) {
        const card = requireArg(args, 0, 'card-id');
        const { add, remove } = assignmentFlags(flags, 'member');
        if (add) await client.addMemberToCard(card, add);
        if (remove) await client.removeMemberFromCard(card, remove);
        out.lines<Assignment>({ card, added: add, removed: remove }, (r) => assignmentLines('Member', r));
      },
    },
  },
};
