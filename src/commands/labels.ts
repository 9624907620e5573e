import { ValidationError } from '../api/errors.js';
import { mergeParams } from '../api/params.js';
import { requireArg, requireFlag, stringFlag } from '../args.js';
import type { CommandGroup } from './types.js';
import { deletedResult, labelsView } from './views.js';

export const labelsGroup: CommandGroup = {
  name: 'labels',
  summary: 'Manage board labels',
  defaultCommand: 'list',
  commands: {
    list: {
      usage: 'labels list --board <board-id>',
      maxArgs: 0,
      summary: 'List labels defined on a board',
      async run({ client, out, flags }) {
        out.list(await client.getBoardLabels(requireFlag(flags, 'board')), labelsView);
      },
    },

    get: {
      usage: 'labels get <label-id>',
      maxArgs: 1,
      summary: 'Show one label',
      async run({ client, out, args }) {
        const label = await client.getLabel(requireArg(args, 0, 'label-id'));
        out.detail(label, (l) => [
          ['ID', l.id],
          ['Name', l.name || '-'],
          ['Color', l.color ?? '-'],
          ['Board', l.idBoard ?? ''],
        ]);
      },
    },

    create: {
      usage: 'labels create <name> --board <board-id> --color <color>',
      maxArgs: 1,
      summary: 'Create a label on a board',
      async run({ client, out, args, flags }) {
        const name = requireArg(args, 0, 'name');
        const label = await client.createLabel({
          idBoard: requireFlag(flags, 'board'),
          name,
          color: requireFlag(flags, 'color'),
        });
        out.lines(label, (l) => [`Label created: ${l.name || '-'} (${l.color ?? '-'})`, `ID: ${l.id}`]);
      },
    },

    update: {
      usage: 'labels update <label-id> [--name <name>] [--color <color>]',
      maxArgs: 1,
      summary: "Change a label's name or colour",
      async run({ client, out, args, flags }) {
        const id = requireArg(args, 0, 'label-id');
        const params = mergeParams({ name: stringFlag(flags, 'name'), color: stringFlag(flags, 'color') });
        if (Object.keys(params).length === 0) {
          throw new ValidationError('nothing to update: pass --name or --color');
        }

        const label = await client.updateLabel(id, params);
        out.lines(label, (l) => [`Label updated: ${l.name || '-'} (${l.color ?? '-'})`]);
      },
    },

    delete: {
      usage: 'labels delete <label-id>',
      maxArgs: 1,
      summary: 'Delete a label from its board and every card',
      async run({ client, out, args }) {
        const id = requireArg(args, 0, 'label-id');
        await client.deleteLabel(id);
        out.lines(deletedResult(id), (r) => [`Label ${r.id} deleted.`]);
      },
    },
  },
};
