import { ValidationError } from '../api/errors.js';
import type { SearchResult } from '../api/types.js';
import { intFlag, listFlag, requireArg } from '../args.js';
import { formatBool, formatTable, truncate } from '../output/format.js';
import type { CommandGroup } from './types.js';
import { cardsView, membersView } from './views.js';

export const SEARCH_MODEL_TYPES = ['actions', 'boards', 'cards', 'members', 'organizations'] as const;
export const DEFAULT_SEARCH_LIMIT = 10;

function sections(result: SearchResult): string {
  const { cards, boards, members } = result;
  if (cards.length + boards.length + members.length === 0) {
    return 'No results found.\n';
  }

  let text = '';
  if (cards.length > 0) {
    const view = cardsView();
    text += `\nCards (${cards.length})\n${formatTable(view.headers, cards.map(view.row))}`;
  }
  if (boards.length > 0) {
    const rows = boards.map((b) => [b.id, truncate(b.name ?? '', 44), b.shortUrl ?? '', formatBool(b.closed)]);
    text += `\nBoards (${boards.length})\n${formatTable(['ID', 'NAME', 'URL', 'CLOSED'], rows)}`;
  }
  if (members.length > 0) {
    text += `\nMembers (${members.length})\n${formatTable(membersView.headers, members.map(membersView.row))}`;
  }
  return text;
}

export const searchGroup: CommandGroup = {
  name: 'search',
  summary: 'Search cards, boards and members',
  defaultCommand: 'run',
  bare: true,
  commands: {
    run: {
      usage: 'search <query> [--type cards,boards,members] [--limit <n>]',
      maxArgs: 1,
      summary: 'Search across everything the member can see',
      async run({ client, out, args, flags }) {
        const query = requireArg(args, 0, 'query');
        const modelTypes = listFlag(flags, 'type');
        const unknown = modelTypes.filter((t) => !(SEARCH_MODEL_TYPES as readonly string[]).includes(t));
        if (unknown.length > 0) {
          throw new ValidationError(`unknown --type ${unknown.join(', ')}; expected one of: ${SEARCH_MODEL_TYPES.join(', ')}`);
        }

        const result = await client.search(query, { modelTypes, limit: intFlag(flags, 'limit', DEFAULT_SEARCH_LIMIT) });
        out.value(result, (r) => out.write(sections(r)));
      },
    },
  },
};
