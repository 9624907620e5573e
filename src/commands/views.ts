import type { Board, Card, Checklist, Label, Member, TrelloList } from '../api/types.js';
import { formatBool, formatDate, formatLabels, formatTime, labelNames, truncate } from '../output/format.js';
import type { ListView } from '../output/output.js';

// Table layouts shared by more than one command.

export function cardsView(nameWidth = 44): ListView<Card> {
  return {
    empty: 'No cards found.',
    headers: ['ID', '#', 'NAME', 'DUE', 'LABELS'],
    row: (c) => [
      c.id,
      String(c.idShort ?? ''),
      truncate(c.name ?? '', nameWidth),
      formatDate(c.due),
      formatLabels(labelNames(c.labels)),
    ],
  };
}

export const boardsView: ListView<Board> = {
  empty: 'No boards found.',
  headers: ['ID', 'NAME', 'WORKSPACE', 'LAST ACTIVITY', 'CLOSED'],
  row: (b) => [
    b.id,
    truncate(b.name ?? '', 40),
    truncate(b.idOrganization ?? '', 24),
    formatTime(b.dateLastActivity),
    formatBool(b.closed),
  ],
};

export const listsView: ListView<TrelloList> = {
  empty: 'No lists found.',
  headers: ['ID', 'NAME', 'CLOSED'],
  row: (l) => [l.id, truncate(l.name ?? '', 50), formatBool(l.closed)],
};

export const membersView: ListView<Member> = {
  empty: 'No members found.',
  headers: ['ID', 'NAME', 'USERNAME'],
  row: (m) => [m.id, m.fullName ?? '', m.username ?? ''],
};

export const labelsView: ListView<Label> = {
  empty: 'No labels found.',
  headers: ['ID', 'NAME', 'COLOR'],
  row: (l) => [l.id, l.name || '-', l.color ?? '-'],
};

export function deletedResult(id: string): { id: string; deleted: true } {
  return { id, deleted: true };
}

/** A checklist as a heading line followed by one line per item. */
export function checklistLines(checklist: Checklist): string[] {
  const lines = [`${checklist.name ?? ''} (ID: ${checklist.id})`];
  const items = checklist.checkItems ?? [];
  if (items.length === 0) {
    lines.push('  (empty)');
    return lines;
  }
  for (const item of items) {
    const mark = item.state === 'complete' ? '[x]' : '[ ]';
    lines.push(`  ${mark} ${item.name ?? ''}  (ID: ${item.id})`);
  }
  return lines;
}
