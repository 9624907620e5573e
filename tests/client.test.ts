import { AxiosError } from 'axios';
import { describe, expect, it } from 'vitest';
import { z } from 'zod';

import { decode, REQUEST_TIMEOUT_MS, TrelloClient } from '../src/api/client.js';
import { ApiError, DecodeError, TransportError } from '../src/api/errors.js';
import { CLEAR } from '../src/api/params.js';
import { fakeClient, fakeTrello } from './fakes.js';

describe('TrelloClient.buildUrl', () => {
  it('puts key and token first and keeps caller params', () => {
    const client = new TrelloClient('test-key', 'test-token');
    expect(client.buildUrl('/boards/b1', { fields: 'name' })).toBe(
      'https://api.trello.com/1/boards/b1?key=test-key&token=test-token&fields=name',
    );
  });

  it('lets a caller key/token override the stored credentials', () => {
    const client = new TrelloClient('test-key', 'test-token', { baseUrl: 'http://trello.test/1' });
    const url = new URL(client.buildUrl('/members/me', { token: 'other-token' }));
    expect(url.searchParams.get('key')).toBe('test-key');
    expect(url.searchParams.get('token')).toBe('other-token');
  });

  it('omits empty params and sends CLEAR as an empty value', () => {
    const client = new TrelloClient('test-key', 'test-token');
    const url = new URL(client.buildUrl('/cards/c1', { desc: '', name: undefined, due: CLEAR }));
    expect(url.searchParams.has('desc')).toBe(false);
    expect(url.searchParams.has('name')).toBe(false);
    expect(url.searchParams.get('due')).toBe('');
  });
});

describe('TrelloClient.execute', () => {
  it('returns the body text verbatim on success', async () => {
    const { client, requests } = fakeClient(() => ({ body: '{"id":"b1"}' }));

    await expect(client.execute('GET', '/boards/b1')).resolves.toBe('{"id":"b1"}');
    expect(requests).toHaveLength(1);
    expect(requests[0]?.method).toBe('GET');
    expect(requests[0]?.url.pathname).toBe('/1/boards/b1');
    expect(requests[0]?.headers.accept).toBe('application/json');
    expect(requests[0]?.headers['content-type']).toBeUndefined();
    expect(requests[0]?.body).toBeUndefined();
  });

  it('serializes a body as JSON with a content type', async () => {
    const { client, requests } = fakeClient(() => ({ body: '{}' }));

    await client.execute('POST', '/cards', undefined, { name: 'Write docs' });

    expect(requests[0]?.body).toBe('{"name":"Write docs"}');
    expect(requests[0]?.headers['content-type']).toBe('application/json');
  });

  it('rejects with ApiError carrying status and raw body for status >= 400', async () => {
    const { client } = fakeClient(() => ({ status: 404, body: 'The requested resource was not found.' }));

    const err = await client.execute('GET', '/boards/missing').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ApiError);
    expect(err).toMatchObject({
      kind: 'api',
      status: 404,
      body: 'The requested resource was not found.',
      message: 'HTTP 404: The requested resource was not found.',
    });
  });

  it('treats 399 as success', async () => {
    const { client } = fakeClient(() => ({ status: 399, body: 'ok' }));
    await expect(client.execute('GET', '/x')).resolves.toBe('ok');
  });

  it('wraps a failure before any response in TransportError', async () => {
    const cause = new Error('connect ECONNREFUSED 127.0.0.1:443');
    const { client } = fakeClient(() => cause);

    const err = await client.execute('GET', '/members/me').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TransportError);
    expect(err).toMatchObject({ kind: 'transport', message: 'request failed: connect ECONNREFUSED 127.0.0.1:443' });
    expect(err instanceof TransportError ? err.cause : undefined).toBe(cause);
  });
});

describe('decode', () => {
  const Schema = z.object({ id: z.string() }).passthrough();

  it('keeps fields the schema does not name', () => {
    expect(decode(Schema, '{"id":"x","extra":1}', 'thing')).toEqual({ id: 'x', extra: 1 });
  });

  it('rejects malformed JSON with DecodeError', () => {
    expect(() => decode(Schema, '<html>', 'thing')).toThrow(DecodeError);
    expect(() => decode(Schema, '<html>', 'thing')).toThrow(/^decoding thing: /);
  });

  it('rejects a shape mismatch with the failing path', () => {
    expect(() => decode(Schema, '{"id":5}', 'board')).toThrow('decoding board: Expected string, received number at id');
  });
});

describe('typed wrappers', () => {
  it('getBoard decodes a board and preserves unknown fields', async () => {
    const { client, requests } = fakeClient(() => ({ body: { id: 'b1', name: 'Roadmap', powerUps: ['x'] } }));

    const board = await client.getBoard('b1');

    expect(board).toEqual({ id: 'b1', name: 'Roadmap', powerUps: ['x'] });
    expect(requests[0]?.url.pathname).toBe('/1/boards/b1');
  });

  it('a success payload of the wrong shape is a DecodeError, not a partial value', async () => {
    const { client } = fakeClient(() => ({ body: { name: 'no id' } }));
    await expect(client.getCard('c1')).rejects.toBeInstanceOf(DecodeError);
  });

  it('getMyBoards asks for the member boards with a filter', async () => {
    const { client, requests } = fakeClient(() => ({ body: [] }));

    await expect(client.getMyBoards('open')).resolves.toEqual([]);

    expect(requests[0]?.url.pathname).toBe('/1/members/me/boards');
    expect(requests[0]?.url.searchParams.get('filter')).toBe('open');
  });

  it('createBoard maps the permission level to prefs_permissionLevel', async () => {
    const { client, requests } = fakeClient(() => ({ body: { id: 'b2' } }));

    await client.createBoard({ name: 'Ops', permissionLevel: 'private', desc: '' });

    const q = requests[0]?.url.searchParams;
    expect(requests[0]?.method).toBe('POST');
    expect(q?.get('name')).toBe('Ops');
    expect(q?.get('prefs_permissionLevel')).toBe('private');
    expect(q?.has('desc')).toBe(false);
  });

  it('createCard comma-joins label ids', async () => {
    const { client, requests } = fakeClient(() => ({ body: { id: 'c1' } }));

    await client.createCard({ idList: 'l1', name: 'Task', idLabels: ['a', 'b'] });

    expect(requests[0]?.url.searchParams.get('idLabels')).toBe('a,b');
    expect(requests[0]?.url.searchParams.get('idList')).toBe('l1');
  });

  it('archiveList puts the closed value', async () => {
    const { client, requests } = fakeClient(() => ({ body: { id: 'l1', closed: true } }));

    await client.archiveList('l1', true);

    expect(requests[0]?.method).toBe('PUT');
    expect(requests[0]?.url.pathname).toBe('/1/lists/l1/closed');
    expect(requests[0]?.url.searchParams.get('value')).toBe('true');
  });

  it('moveCard only sends idBoard when given', async () => {
    const { client, requests } = fakeClient(() => ({ body: { id: 'c1' } }));

    await client.moveCard('c1', 'l2');
    await client.moveCard('c1', 'l3', 'b9');

    expect(requests[0]?.url.searchParams.has('idBoard')).toBe(false);
    expect(requests[1]?.url.searchParams.get('idList')).toBe('l3');
    expect(requests[1]?.url.searchParams.get('idBoard')).toBe('b9');
  });

  it('getCardComments filters to comment actions', async () => {
    const { client, requests } = fakeClient(() => ({ body: [{ id: 'a1', data: { text: 'hi' } }] }));

    const comments = await client.getCardComments('c1', 5);

    expect(comments[0]?.data?.text).toBe('hi');
    expect(requests[0]?.url.pathname).toBe('/1/cards/c1/actions');
    expect(requests[0]?.url.searchParams.get('filter')).toBe('commentCard');
    expect(requests[0]?.url.searchParams.get('limit')).toBe('5');
  });

  it('updateCheckItem addresses the item through its card', async () => {
    const { client, requests } = fakeClient(() => ({ body: { id: 'i1', state: 'complete' } }));

    await client.updateCheckItem('c1', 'cl1', 'i1', 'complete');

    expect(requests[0]?.url.pathname).toBe('/1/cards/c1/checklist/cl1/checkItem/i1');
    expect(requests[0]?.url.searchParams.get('state')).toBe('complete');
    expect(requests[0]?.url.searchParams.get('idChecklist')).toBe('cl1');
  });

  it('delete operations ignore the response body', async () => {
    const { client, requests } = fakeClient(() => ({ body: '{"_value":null}' }));

    await expect(client.deleteCard('c1')).resolves.toBeUndefined();
    await expect(client.deleteCheckItem('cl1', 'i1')).resolves.toBeUndefined();

    expect(requests.map((r) => `${r.method} ${r.url.pathname}`)).toEqual([
      'DELETE /1/cards/c1',
      'DELETE /1/checklists/cl1/checkItems/i1',
    ]);
  });

  it('label and member assignment post the id as value', async () => {
    const { client, requests } = fakeClient(() => ({ body: ['lb1'] }));

    await client.addLabelToCard('c1', 'lb1');
    await client.removeMemberFromCard('c1', 'm1');

    expect(requests[0]?.url.pathname).toBe('/1/cards/c1/idLabels');
    expect(requests[0]?.url.searchParams.get('value')).toBe('lb1');
    expect(`${requests[1]?.method} ${requests[1]?.url.pathname}`).toBe('DELETE /1/cards/c1/idMembers/m1');
  });
});

describe('search', () => {
  it('defaults to all model types and sets per-type limits', async () => {
    const { client, requests } = fakeClient(() => ({ body: {} }));

    const result = await client.search('deploy', { limit: 5 });

    expect(result.cards).toEqual([]);
    const q = requests[0]?.url.searchParams;
    expect(q?.get('query')).toBe('deploy');
    expect(q?.get('modelTypes')).toBe('all');
    expect(q?.get('cards_limit')).toBe('5');
    expect(q?.get('boards_limit')).toBe('5');
    expect(q?.get('members_limit')).toBe('5');
    expect(q?.get('card_fields')).toBe('id,name,idBoard,idList,shortUrl,labels,due,dueComplete');
    expect(q?.get('board_fields')).toBe('id,name,shortUrl,closed');
  });

  it('comma-joins model types and leaves limits alone when not positive', async () => {
    const { client, requests } = fakeClient(() => ({ body: {} }));

    await client.search('bug', { modelTypes: ['cards', 'boards'], limit: 0 });

    const q = requests[0]?.url.searchParams;
    expect(q?.get('modelTypes')).toBe('cards,boards');
    expect(q?.has('cards_limit')).toBe(false);
  });
});

describe('transport options', () => {
  it('honours a custom base URL', async () => {
    const { http, requests } = fakeTrello(() => ({ body: { id: 'me' } }));
    const client = new TrelloClient('test-key', 'test-token', { http, baseUrl: 'http://trello.test/api' });

    await client.getMember('me');

    expect(requests[0]?.url.origin).toBe('http://trello.test');
    expect(requests[0]?.url.pathname).toBe('/api/members/me');
  });

  it('gives every request a 30 second timeout', async () => {
    const { client, requests } = fakeClient(() => ({ body: { id: 'me' } }));

    await client.getMember('me');

    expect(REQUEST_TIMEOUT_MS).toBe(30_000);
    expect(requests[0]?.timeout).toBe(30_000);
  });

  it('takes a timeout override', async () => {
    const { http, requests } = fakeTrello(() => ({ body: { id: 'me' } }));
    const client = new TrelloClient('test-key', 'test-token', { http, timeoutMs: 5_000 });

    await client.getMember('me');

    expect(requests[0]?.timeout).toBe(5_000);
  });

  it('reports a timed out request as a transport failure', async () => {
    const { client } = fakeClient(() => new AxiosError('timeout of 30000ms exceeded', AxiosError.ECONNABORTED));

    const err = await client.execute('GET', '/members/me').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TransportError);
    expect(err).toMatchObject({ kind: 'transport', message: 'request failed: timeout of 30000ms exceeded' });
  });
});
