import type { TrelloClient } from '../api/client.js';
import type { CheckItemState } from '../api/types.js';
import { requireArg, requireFlag, type Flags } from '../args.js';
import type { Output } from '../output/output.js';
import type { Command, CommandGroup } from './types.js';
import { checklistLines, deletedResult } from './views.js';

async function setItemState(
  client: TrelloClient,
  out: Output,
  args: readonly string[],
  flags: Flags,
  state: CheckItemState,
): Promise<void> {
  const itemId = requireArg(args, 0, 'check-item-id');
  const item = await client.updateCheckItem(requireFlag(flags, 'card'), requireFlag(flags, 'checklist'), itemId, state);
  const verb = state === 'complete' ? 'checked' : 'unchecked';
  out.lines(item, (i) => [`Item ${verb}: ${i.name ?? ''}`]);
}

function stateCommand(state: CheckItemState): Command {
  const sub = state === 'complete' ? 'check' : 'uncheck';
  return {
    usage: `checklists ${sub} <check-item-id> --card <card-id> --checklist <checklist-id>`,
    maxArgs: 1,
    summary: `Mark a checklist item as ${state}`,
    run: ({ client, out, args, flags }) => setItemState(client, out, args, flags, state),
  };
}

export const checklistsGroup: CommandGroup = {
  name: 'checklists',
  summary: 'Manage checklists and their items',
  commands: {
    get: {
      usage: 'checklists get <checklist-id>',
      maxArgs: 1,
      summary: 'Show a checklist with its items',
      async run({ client, out, args }) {
        const checklist = await client.getChecklist(requireArg(args, 0, 'checklist-id'));
        out.lines(checklist, checklistLines);
      },
    },

    create: {
      usage: 'checklists create <name> --card <card-id>',
      maxArgs: 1,
      summary: 'Create a checklist on a card',
      async run({ client, out, args, flags }) {
        const name = requireArg(args, 0, 'name');
        const checklist = await client.createChecklist(requireFlag(flags, 'card'), name);
        out.lines(checklist, (cl) => [`Checklist created: ${cl.name ?? ''}`, `ID:   ${cl.id}`, `Card: ${cl.idCard ?? ''}`]);
      },
    },

    rename: {
      usage: 'checklists rename <checklist-id> <new-name>',
      maxArgs: 2,
      summary: 'Rename a checklist',
      async run({ client, out, args }) {
        const id = requireArg(args, 0, 'checklist-id');
        const checklist = await client.updateChecklist(id, { name: requireArg(args, 1, 'new-name') });
        out.lines(checklist, (cl) => [`Checklist renamed to: ${cl.name ?? ''}`]);
      },
    },

    delete: {
      usage: 'checklists delete <checklist-id>',
      maxArgs: 1,
      summary: 'Delete a checklist and all its items',
      async run({ client, out, args }) {
        const id = requireArg(args, 0, 'checklist-id');
        await client.deleteChecklist(id);
        out.lines(deletedResult(id), (r) => [`Checklist ${r.id} deleted.`]);
      },
    },

    'add-item': {
      usage: 'checklists add-item <name> --checklist <checklist-id>',
      maxArgs: 1,
      summary: 'Add an item to a checklist',
      async run({ client, out, args, flags }) {
        const name = requireArg(args, 0, 'name');
        const item = await client.createCheckItem(requireFlag(flags, 'checklist'), name);
        out.lines(item, (i) => [`Item added: ${i.name ?? ''}`, `ID: ${i.id}`]);
      },
    },

    check: stateCommand('complete'),
    uncheck: stateCommand('incomplete'),

    'delete-item': {
      usage: 'checklists delete-item <check-item-id> --checklist <checklist-id>',
      maxArgs: 1,
      summary: 'Remove an item from a checklist',
      async run({ client, out, args, flags }) {
        const itemId = requireArg(args, 0, 'check-item-id');
        await client.deleteCheckItem(requireFlag(flags, 'checklist'), itemId);
        out.lines(deletedResult(itemId), (r) => [`Item ${r.id} deleted.`]);
      },
    },
  },
};
