import { describe, expect, it } from 'vitest';

import { CLEAR, mergeParams } from '../src/api/params.js';

describe('mergeParams', () => {
  it('lets later sources win', () => {
    expect(mergeParams({ a: '1', b: '2' }, { b: '3' })).toEqual({ a: '1', b: '3' });
  });

  it('drops empty, null and undefined values without masking earlier ones', () => {
    expect(mergeParams({ name: 'kept', desc: 'x' }, { name: '', desc: null, pos: undefined })).toEqual({
      name: 'kept',
      desc: 'x',
    });
  });

  it('encodes CLEAR as an explicit empty value', () => {
    expect(mergeParams({ due: '2024-12-31' }, { due: CLEAR })).toEqual({ due: '' });
  });

  it('stringifies numbers and booleans', () => {
    expect(mergeParams({ limit: 10, closed: false, dueComplete: true })).toEqual({
      limit: '10',
      closed: 'false',
      dueComplete: 'true',
    });
  });

  it('skips missing sources', () => {
    expect(mergeParams(undefined, { a: 'x' }, undefined)).toEqual({ a: 'x' });
    expect(mergeParams()).toEqual({});
  });
});
