import { z } from 'zod';

// Only `id` is required: the API drops fields when a projection is requested
// (search card_fields/board_fields), and passthrough keeps anything not listed
// here so JSON output shows the payload as received.

const Timestamp = z.string().nullable().optional();

export const BoardPrefsSchema = z
  .object({
    permissionLevel: z.string().optional(),
    voting: z.string().optional(),
    comments: z.string().optional(),
    background: z.string().optional(),
    backgroundColor: z.string().nullable().optional(),
    backgroundImage: z.string().nullable().optional(),
    selfJoin: z.boolean().optional(),
    cardCovers: z.boolean().optional(),
    isTemplate: z.boolean().optional(),
    cardAging: z.string().optional(),
  })
  .passthrough();

export const LabelSchema = z
  .object({
    id: z.string(),
    idBoard: z.string().optional(),
    name: z.string().optional(),
    color: z.string().nullable().optional(),
  })
  .passthrough();

export const BoardSchema = z
  .object({
    id: z.string(),
    name: z.string().optional(),
    desc: z.string().optional(),
    closed: z.boolean().optional(),
    idOrganization: z.string().nullable().optional(),
    url: z.string().optional(),
    shortUrl: z.string().optional(),
    shortLink: z.string().optional(),
    dateLastActivity: Timestamp,
    prefs: BoardPrefsSchema.optional(),
    labelNames: z.record(z.string(), z.string()).optional(),
  })
  .passthrough();

export const ListSchema = z
  .object({
    id: z.string(),
    name: z.string().optional(),
    closed: z.boolean().optional(),
    idBoard: z.string().optional(),
    pos: z.number().optional(),
    subscribed: z.boolean().optional(),
  })
  .passthrough();

export const CardBadgesSchema = z
  .object({
    attachments: z.number().optional(),
    checkItems: z.number().optional(),
    checkItemsChecked: z.number().optional(),
    comments: z.number().optional(),
    description: z.boolean().optional(),
    due: Timestamp,
    dueComplete: z.boolean().optional(),
    subscribed: z.boolean().optional(),
    votes: z.number().optional(),
  })
  .passthrough();

export const CardSchema = z
  .object({
    id: z.string(),
    idShort: z.number().optional(),
    name: z.string().optional(),
    desc: z.string().optional(),
    closed: z.boolean().optional(),
    idBoard: z.string().optional(),
    idList: z.string().optional(),
    idMembers: z.array(z.string()).optional(),
    idLabels: z.array(z.string()).optional(),
    labels: z.array(LabelSchema).optional(),
    due: Timestamp,
    dueComplete: z.boolean().optional(),
    start: Timestamp,
    pos: z.number().optional(),
    shortLink: z.string().optional(),
    shortUrl: z.string().optional(),
    url: z.string().optional(),
    subscribed: z.boolean().optional(),
    dateLastActivity: Timestamp,
    badges: CardBadgesSchema.optional(),
  })
  .passthrough();

export const MemberSchema = z
  .object({
    id: z.string(),
    fullName: z.string().optional(),
    username: z.string().optional(),
    email: z.string().nullable().optional(),
    bio: z.string().optional(),
    avatarUrl: z.string().nullable().optional(),
    url: z.string().optional(),
    idBoards: z.array(z.string()).optional(),
    memberType: z.string().optional(),
    confirmed: z.boolean().optional(),
  })
  .passthrough();

export const OrganizationSchema = z
  .object({
    id: z.string(),
    name: z.string().optional(),
    displayName: z.string().optional(),
    desc: z.string().optional(),
    url: z.string().optional(),
    idBoards: z.array(z.string()).optional(),
  })
  .passthrough();

export const CheckItemSchema = z
  .object({
    id: z.string(),
    name: z.string().optional(),
    state: z.enum(['complete', 'incomplete']).optional(),
    idChecklist: z.string().optional(),
    idCard: z.string().optional(),
    pos: z.number().optional(),
    due: Timestamp,
  })
  .passthrough();

export const ChecklistSchema = z
  .object({
    id: z.string(),
    name: z.string().optional(),
    idBoard: z.string().optional(),
    idCard: z.string().optional(),
    pos: z.number().optional(),
    checkItems: z.array(CheckItemSchema).optional(),
  })
  .passthrough();

export const AttachmentSchema = z
  .object({
    id: z.string(),
    name: z.string().optional(),
    url: z.string().optional(),
    mimeType: z.string().nullable().optional(),
    bytes: z.number().nullable().optional(),
    date: Timestamp,
    isUpload: z.boolean().optional(),
  })
  .passthrough();

export const ActionSchema = z
  .object({
    id: z.string(),
    idMemberCreator: z.string().optional(),
    type: z.string().optional(),
    date: Timestamp,
    data: z
      .object({
        text: z.string().optional(),
      })
      .passthrough()
      .optional(),
    memberCreator: MemberSchema.optional(),
  })
  .passthrough();

export const SearchResultSchema = z
  .object({
    cards: z.array(CardSchema).default([]),
    boards: z.array(BoardSchema).default([]),
    members: z.array(MemberSchema).default([]),
    options: z
      .object({
        terms: z.array(z.unknown()).optional(),
        modifiers: z.array(z.unknown()).optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export type Board = z.infer<typeof BoardSchema>;
export type TrelloList = z.infer<typeof ListSchema>;
export type Card = z.infer<typeof CardSchema>;
export type Label = z.infer<typeof LabelSchema>;
export type Member = z.infer<typeof MemberSchema>;
export type Organization = z.infer<typeof OrganizationSchema>;
export type Checklist = z.infer<typeof ChecklistSchema>;
export type CheckItem = z.infer<typeof CheckItemSchema>;
export type Attachment = z.infer<typeof AttachmentSchema>;
export type Action = z.infer<typeof ActionSchema>;
export type SearchResult = z.infer<typeof SearchResultSchema>;

export type CheckItemState = NonNullable<CheckItem['state']>;
