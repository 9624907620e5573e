import axios, { type AxiosInstance } from 'axios';
import type { z } from 'zod';

import { silentLogger, type Logger } from '../logger.js';
import { ApiError, DecodeError, TransportError, errorMessage } from './errors.js';
import { mergeParams, type ParamSource } from './params.js';
import {
  ActionSchema,
  AttachmentSchema,
  BoardSchema,
  CardSchema,
  CheckItemSchema,
  ChecklistSchema,
  LabelSchema,
  ListSchema,
  MemberSchema,
  OrganizationSchema,
  SearchResultSchema,
  type Action,
  type Attachment,
  type Board,
  type Card,
  type CheckItem,
  type CheckItemState,
  type Checklist,
  type Label,
  type Member,
  type Organization,
  type SearchResult,
  type TrelloList,
} from './types.js';

export const API_BASE = 'https://api.trello.com/1';
export const REQUEST_TIMEOUT_MS = 30_000;

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export type TrelloClientOptions = {
  baseUrl?: string;
  timeoutMs?: number;
  /** Transport; tests pass an instance with an in-process adapter. */
  http?: AxiosInstance;
  logger?: Logger;
};

export type SearchOptions = {
  /** cards, boards, members, ... Empty means all. */
  modelTypes?: readonly string[];
  /** Per-type result cap; 0 or less leaves the API default. */
  limit?: number;
};

const SEARCH_CARD_FIELDS = 'id,name,idBoard,idList,shortUrl,labels,due,dueComplete';
const SEARCH_BOARD_FIELDS = 'id,name,shortUrl,closed';

/**
 * Parse and validate a success payload. Anything that is not JSON of the
 * expected shape becomes a DecodeError rather than a partially filled value.
 */
export function decode<S extends z.ZodTypeAny>(schema: S, raw: string, what: string): z.output<S> {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new DecodeError(what, errorMessage(err), { cause: err });
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new DecodeError(what, `${issue?.message ?? 'unexpected shape'}${where}`, { cause: parsed.error });
  }
  return parsed.data;
}

/**
 * Authenticated Trello REST client.
 *
 * Every request carries the key/token pair as query parameters. There is no
 * retry and no shared state beyond the credentials; one instance is built per
 * CLI invocation and handed to the command that needs it.
 */
export class TrelloClient {
  private readonly apiKey: string;
  private readonly apiToken: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly http: AxiosInstance;
  private readonly logger: Logger;

  constructor(apiKey: string, apiToken: string, opts: TrelloClientOptions = {}) {
    this.apiKey = apiKey;
    this.apiToken = apiToken;
    this.baseUrl = opts.baseUrl ?? API_BASE;
    this.timeoutMs = opts.timeoutMs ?? REQUEST_TIMEOUT_MS;
    this.http = opts.http ?? axios.create();
    this.logger = opts.logger ?? silentLogger;
  }

  /** Base URL + path, with key/token first and caller params layered on top. */
  buildUrl(path: string, params?: ParamSource): string {
    const url = new URL(`${this.baseUrl}${path}`);
    const query = mergeParams({ key: this.apiKey, token: this.apiToken }, params);
    for (const [k, v] of Object.entries(query)) {
      url.searchParams.set(k, v);
    }
    return url.toString();
  }

  /**
   * Perform one request and return the raw response text.
   *
   * Rejects with TransportError when no response arrives and with ApiError
   * for any status >= 400. Decoding is left to the caller.
   */
  async execute(method: HttpMethod, path: string, params?: ParamSource, body?: unknown): Promise<string> {
    const headers: Record<string, string> = { Accept: 'application/json' };
    let data: string | undefined;
    if (body !== undefined) {
      data = JSON.stringify(body);
      headers['Content-Type'] = 'application/json';
    }

    const started = Date.now();
    let status: number;
    let text: string;
    try {
      const res = await this.http.request<string>({
        method,
        url: this.buildUrl(path, params),
        data,
        headers,
        timeout: this.timeoutMs,
        responseType: 'text',
        transformResponse: [(raw: unknown) => raw],
        validateStatus: () => true,
      });
      status = res.status;
      text = typeof res.data === 'string' ? res.data : String(res.data ?? '');
    } catch (err) {
      this.logger.debug({ method, path, err: errorMessage(err) }, 'transport failure');
      throw new TransportError(errorMessage(err), { cause: err });
    }

    this.logger.debug({ method, path, status, durationMs: Date.now() - started }, 'trello request');

    if (status >= 400) {
      throw new ApiError(status, text);
    }
    return text;
  }

  private async call<S extends z.ZodTypeAny>(
    schema: S,
    what: string,
    method: HttpMethod,
    path: string,
    params?: ParamSource,
  ): Promise<z.output<S>> {
    const raw = await this.execute(method, path, params);
    return decode(schema, raw, what);
  }

  get<S extends z.ZodTypeAny>(schema: S, what: string, path: string, params?: ParamSource): Promise<z.output<S>> {
    return this.call(schema, what, 'GET', path, params);
  }

  post<S extends z.ZodTypeAny>(schema: S, what: string, path: string, params?: ParamSource): Promise<z.output<S>> {
    return this.call(schema, what, 'POST', path, params);
  }

  put<S extends z.ZodTypeAny>(schema: S, what: string, path: string, params?: ParamSource): Promise<z.output<S>> {
    return this.call(schema, what, 'PUT', path, params);
  }

  async delete(path: string, params?: ParamSource): Promise<void> {
    await this.execute('DELETE', path, params);
  }

  // ---- Boards ----

  getBoard(id: string, params?: ParamSource): Promise<Board> {
    return this.get(BoardSchema, 'board', `/boards/${id}`, params);
  }

  getMyBoards(filter?: string): Promise<Board[]> {
    return this.getMemberBoards('me', filter);
  }

  createBoard(
    input: { name: string; desc?: string; idOrganization?: string; permissionLevel?: string },
    extra?: ParamSource,
  ): Promise<Board> {
    return this.post(
      BoardSchema,
      'board',
      '/boards',
      mergeParams(
        { name: input.name },
        { desc: input.desc, idOrganization: input.idOrganization, prefs_permissionLevel: input.permissionLevel },
        extra,
      ),
    );
  }

  updateBoard(id: string, params: ParamSource): Promise<Board> {
    return this.put(BoardSchema, 'board', `/boards/${id}`, params);
  }

  deleteBoard(id: string): Promise<void> {
    return this.delete(`/boards/${id}`);
  }

  getBoardLists(boardId: string, filter?: string): Promise<TrelloList[]> {
    return this.get(ListSchema.array(), 'lists', `/boards/${boardId}/lists`, { filter });
  }

  getBoardCards(boardId: string, filter?: string): Promise<Card[]> {
    return this.get(CardSchema.array(), 'cards', `/boards/${boardId}/cards`, { filter });
  }

  getBoardMembers(boardId: string): Promise<Member[]> {
    return this.get(MemberSchema.array(), 'members', `/boards/${boardId}/members`);
  }

  getBoardLabels(boardId: string): Promise<Label[]> {
    return this.get(LabelSchema.array(), 'labels', `/boards/${boardId}/labels`);
  }

  // ---- Lists ----

  getList(id: string): Promise<TrelloList> {
    return this.get(ListSchema, 'list', `/lists/${id}`);
  }

  createList(input: { name: string; idBoard: string; pos?: string }): Promise<TrelloList> {
    return this.post(ListSchema, 'list', '/lists', mergeParams({ name: input.name, idBoard: input.idBoard }, { pos: input.pos }));
  }

  updateList(id: string, params: ParamSource): Promise<TrelloList> {
    return this.put(ListSchema, 'list', `/lists/${id}`, params);
  }

  archiveList(id: string, archive: boolean): Promise<TrelloList> {
    return this.put(ListSchema, 'list', `/lists/${id}/closed`, { value: archive });
  }

  getListCards(listId: string, filter?: string): Promise<Card[]> {
    return this.get(CardSchema.array(), 'cards', `/lists/${listId}/cards`, { filter });
  }

  // ---- Cards ----

  getCard(id: string, params?: ParamSource): Promise<Card> {
    return this.get(CardSchema, 'card', `/cards/${id}`, params);
  }

  createCard(
    input: { idList: string; name: string; desc?: string; due?: string; pos?: string; idLabels?: readonly string[] },
    extra?: ParamSource,
  ): Promise<Card> {
    return this.post(
      CardSchema,
      'card',
      '/cards',
      mergeParams(
        { idList: input.idList, name: input.name },
        { desc: input.desc, due: input.due, pos: input.pos, idLabels: input.idLabels?.join(',') },
        extra,
      ),
    );
  }

  updateCard(id: string, params: ParamSource): Promise<Card> {
    return this.put(CardSchema, 'card', `/cards/${id}`, params);
  }

  deleteCard(id: string): Promise<void> {
    return this.delete(`/cards/${id}`);
  }

  /** Move to another list, and optionally another board. */
  moveCard(id: string, idList: string, idBoard?: string): Promise<Card> {
    return this.updateCard(id, mergeParams({ idList }, { idBoard }));
  }

  getCardChecklists(cardId: string): Promise<Checklist[]> {
    return this.get(ChecklistSchema.array(), 'checklists', `/cards/${cardId}/checklists`);
  }

  getCardAttachments(cardId: string): Promise<Attachment[]> {
    return this.get(AttachmentSchema.array(), 'attachments', `/cards/${cardId}/attachments`);
  }

  getCardComments(cardId: string, limit?: number): Promise<Action[]> {
    return this.get(ActionSchema.array(), 'comments', `/cards/${cardId}/actions`, {
      filter: 'commentCard',
      limit: limit && limit > 0 ? limit : undefined,
    });
  }

  addComment(cardId: string, text: string): Promise<Action> {
    return this.post(ActionSchema, 'comment', `/cards/${cardId}/actions/comments`, { text });
  }

  async addLabelToCard(cardId: string, labelId: string): Promise<void> {
    await this.execute('POST', `/cards/${cardId}/idLabels`, { value: labelId });
  }

  removeLabelFromCard(cardId: string, labelId: string): Promise<void> {
    return this.delete(`/cards/${cardId}/idLabels/${labelId}`);
  }

  async addMemberToCard(cardId: string, memberId: string): Promise<void> {
    await this.execute('POST', `/cards/${cardId}/idMembers`, { value: memberId });
  }

  removeMemberFromCard(cardId: string, memberId: string): Promise<void> {
    return this.delete(`/cards/${cardId}/idMembers/${memberId}`);
  }

  // ---- Members ----

  /** `me` addresses the authenticated member. */
  getMember(idOrUsername: string, params?: ParamSource): Promise<Member> {
    return this.get(MemberSchema, 'member', `/members/${idOrUsername}`, params);
  }

  getMemberBoards(idOrUsername: string, filter?: string): Promise<Board[]> {
    return this.get(BoardSchema.array(), 'boards', `/members/${idOrUsername}/boards`, { filter });
  }

  getMemberCards(idOrUsername: string, filter?: string): Promise<Card[]> {
    return this.get(CardSchema.array(), 'cards', `/members/${idOrUsername}/cards`, { filter });
  }

  getMemberOrganizations(idOrUsername: string): Promise<Organization[]> {
    return this.get(OrganizationSchema.array(), 'workspaces', `/members/${idOrUsername}/organizations`);
  }

  // ---- Checklists ----

  getChecklist(id: string): Promise<Checklist> {
    return this.get(ChecklistSchema, 'checklist', `/checklists/${id}`);
  }

  createChecklist(idCard: string, name: string): Promise<Checklist> {
    return this.post(ChecklistSchema, 'checklist', '/checklists', { idCard, name });
  }

  updateChecklist(id: string, params: ParamSource): Promise<Checklist> {
    return this.put(ChecklistSchema, 'checklist', `/checklists/${id}`, params);
  }

  deleteChecklist(id: string): Promise<void> {
    return this.delete(`/checklists/${id}`);
  }

  createCheckItem(checklistId: string, name: string): Promise<CheckItem> {
    return this.post(CheckItemSchema, 'check item', `/checklists/${checklistId}/checkItems`, { name });
  }

  updateCheckItem(cardId: string, checklistId: string, checkItemId: string, state: CheckItemState): Promise<CheckItem> {
    return this.put(
      CheckItemSchema,
      'check item',
      `/cards/${cardId}/checklist/${checklistId}/checkItem/${checkItemId}`,
      { state, idChecklist: checklistId },
    );
  }

  deleteCheckItem(checklistId: string, checkItemId: string): Promise<void> {
    return this.delete(`/checklists/${checklistId}/checkItems/${checkItemId}`);
  }

  // ---- Labels ----

  getLabel(id: string): Promise<Label> {
    return this.get(LabelSchema, 'label', `/labels/${id}`);
  }

  createLabel(input: { idBoard: string; name: string; color: string }): Promise<Label> {
    return this.post(LabelSchema, 'label', '/labels', { idBoard: input.idBoard, name: input.name, color: input.color });
  }

  updateLabel(id: string, params: ParamSource): Promise<Label> {
    return this.put(LabelSchema, 'label', `/labels/${id}`, params);
  }

  deleteLabel(id: string): Promise<void> {
    return this.delete(`/labels/${id}`);
  }

  // ---- Search ----

  search(query: string, opts: SearchOptions = {}): Promise<SearchResult> {
    const types = (opts.modelTypes ?? []).map((t) => t.trim()).filter(Boolean);
    const limit = opts.limit && opts.limit > 0 ? opts.limit : undefined;
    return this.get(SearchResultSchema, 'search results', '/search', {
      query,
      modelTypes: types.length > 0 ? types.join(',') : 'all',
      cards_limit: limit,
      boards_limit: limit,
      members_limit: limit,
      card_fields: SEARCH_CARD_FIELDS,
      board_fields: SEARCH_BOARD_FIELDS,
    });
  }
}
