import { describe, expect, it } from 'vitest';

import {
  boolFlag,
  changedBoolFlag,
  closedFlag,
  intFlag,
  listFlag,
  parseArgs,
  requireArg,
  requireFlag,
  stringFlag,
} from '../src/args.js';

describe('parseArgs', () => {
  it('separates positionals from flags', () => {
    expect(parseArgs(['cards', 'create', 'Fix bug', '--list', 'l1', '--desc=Steps'])).toEqual({
      positionals: ['cards', 'create', 'Fix bug'],
      flags: { list: 'l1', desc: 'Steps' },
    });
  });

  it('never lets a boolean flag swallow the next token', () => {
    const { positionals, flags } = parseArgs(['boards', 'get', '--json', 'b1']);
    expect(positionals).toEqual(['boards', 'get', 'b1']);
    expect(flags.json).toBe(true);
  });

  it('reads explicit boolean values', () => {
    expect(parseArgs(['--due-complete=false']).flags['due-complete']).toBe(false);
    expect(parseArgs(['--closed=yes']).flags.closed).toBe(true);
    expect(() => parseArgs(['--closed=maybe'])).toThrow('--closed expects true or false, got "maybe"');
  });

  it('collects repeated flags', () => {
    expect(parseArgs(['--type', 'cards', '--type', 'boards']).flags.type).toEqual(['cards', 'boards']);
  });

  it('treats everything after -- as positional', () => {
    expect(parseArgs(['cards', 'comment', 'c1', '--', '--not-a-flag']).positionals).toEqual([
      'cards',
      'comment',
      'c1',
      '--not-a-flag',
    ]);
  });

  it('maps -h to help', () => {
    expect(parseArgs(['-h']).flags.help).toBe(true);
  });
});

describe('flag accessors', () => {
  it('stringFlag trims and takes the last value', () => {
    expect(stringFlag({ name: ['a', ' b '] }, 'name')).toBe('b');
    expect(stringFlag({}, 'name')).toBeUndefined();
    expect(() => stringFlag({ name: true }, 'name')).toThrow('--name requires a value');
  });

  it('listFlag splits commas across repeats', () => {
    expect(listFlag({ type: ['cards,boards', ' members '] }, 'type')).toEqual(['cards', 'boards', 'members']);
    expect(listFlag({}, 'type')).toEqual([]);
  });

  it('boolFlag and changedBoolFlag', () => {
    expect(boolFlag({ json: true }, 'json')).toBe(true);
    expect(boolFlag({}, 'json')).toBe(false);
    expect(changedBoolFlag({}, 'closed')).toBeUndefined();
    expect(changedBoolFlag({ closed: false }, 'closed')).toBe(false);
  });

  it('closedFlag folds --open into closed=false', () => {
    expect(closedFlag({ open: true })).toBe(false);
    expect(closedFlag({ closed: true })).toBe(true);
    expect(closedFlag({})).toBeUndefined();
    expect(() => closedFlag({ open: true, closed: true })).toThrow('use either --closed or --open, not both');
  });

  it('requireFlag and requireArg', () => {
    expect(() => requireFlag({}, 'board')).toThrow('--board is required');
    expect(requireArg(['x'], 0, 'id')).toBe('x');
    expect(() => requireArg([], 0, 'card-id')).toThrow('missing argument <card-id>');
  });

  it('intFlag', () => {
    expect(intFlag({}, 'limit', 10)).toBe(10);
    expect(intFlag({ limit: '3' }, 'limit', 10)).toBe(3);
    expect(() => intFlag({ limit: 'lots' }, 'limit', 10)).toThrow('--limit expects an integer, got "lots"');
  });
});
