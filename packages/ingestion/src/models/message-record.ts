import { z } from 'zod';
import type { RawMessage } from '../domain/message.types';
import { toIdentifier, toIdentifierText } from '../utils/identifiers';

export interface SenderRecord {
  id: number | null;
  username: string | null;
  first_name: string | null;
  last_name: string | null;
  is_bot: boolean;
}

export interface ForwardRecord {
  from_id: number | null;
  from_name: string | null;
  date: string | null;
}

export interface ReactionRecord {
  emoji: string | null;
  custom_emoji_id: string | null;
  count: number;
  i_reacted: boolean;
  my_reaction_order: number | null;
}

export interface EntityRecord {
  type: string;
  offset: number;
  length: number;
  url: string | null;
}

export interface MessageRecord {
  id: number;
  chat_id: number | null;
  peer_id: number;
  date: string | null;
  text: string | null;
  sender_id: number | null;
  sender: SenderRecord | null;
  edit_date: string | null;
  out: boolean;
  mentioned: boolean;
  silent: boolean;
  post: boolean;
  views: number | null;
  forwards: number | null;
  pinned: boolean;
  reply_to_msg_id: number | null;
  forward: ForwardRecord | null;
  has_media: boolean;
  media_type: string | null;
  reactions: ReactionRecord[];
  entities: EntityRecord[];
}

// Epoch seconds (gramjs), Date objects and ISO strings all normalize to ISO-8601 UTC.
function toIsoDate(value: unknown): string | null {
  let millis: number;
  if (value instanceof Date) {
    millis = value.getTime();
  } else if (typeof value === 'number') {
    millis = value * 1000;
  } else if (typeof value === 'string') {
    millis = Date.parse(value);
  } else {
    return null;
  }
  if (!Number.isFinite(millis) || millis <= 0) return null;
  return new Date(millis).toISOString();
}

const identifier = z.unknown().transform(toIdentifier);
const longIdentifier = z.unknown().transform(toIdentifierText);
const isoDate = z.unknown().transform(toIsoDate);
const flag = z.boolean().catch(false);
const optionalText = z.string().nullable().catch(null);
const optionalCount = z.number().int().nullable().catch(null);
const className = z.string().catch('Unknown');

const PeerSchema = z.object({
  className: z.string().optional().catch(undefined),
  userId: identifier,
  chatId: identifier,
  channelId: identifier,
});

/** Marked peer id, as Telegram clients print it (-100 prefix for channels, - for chats). */
function toMarkedPeerId(value: unknown): number | null {
  const plain = toIdentifier(value);
  if (plain !== null) return plain;

  const peer = PeerSchema.safeParse(value);
  if (!peer.success) return null;
  const { userId, chatId, channelId } = peer.data;
  if (userId !== null) return userId;
  if (chatId !== null) return -chatId;
  if (channelId !== null) return -(1_000_000_000_000 + channelId);
  return null;
}

const SenderSchema = z.object({
  id: identifier,
  username: optionalText,
  firstName: optionalText,
  lastName: optionalText,
  bot: flag,
});

const ForwardSchema = z.object({
  fromId: z.unknown().transform(toMarkedPeerId),
  fromName: optionalText,
  date: isoDate,
});

const ReactionSchema = z.object({
  reaction: z
    .object({
      emoticon: optionalText,
      documentId: longIdentifier,
    })
    .nullable()
    .catch(null),
  count: z.number().int().catch(0),
  chosenOrder: optionalCount.optional(),
});

const EntitySchema = z.object({
  className,
  offset: z.number().int().catch(0),
  length: z.number().int().catch(0),
  url: optionalText.optional(),
});

const MessageSchema = z.object({
  id: z.number().int(),
  chatId: identifier,
  date: isoDate,
  // gramjs exposes the rendered text as `text` and the raw body as `message`.
  text: optionalText.optional(),
  message: optionalText.optional(),
  senderId: identifier,
  sender: SenderSchema.nullable().catch(null),
  editDate: isoDate,
  out: flag,
  mentioned: flag,
  silent: flag,
  post: flag,
  views: optionalCount.optional(),
  forwards: optionalCount.optional(),
  pinned: flag,
  replyToMsgId: identifier,
  replyTo: z.object({ replyToMsgId: identifier }).nullable().catch(null),
  fwdFrom: ForwardSchema.nullable().catch(null),
  media: z.object({ className }).nullable().catch(null),
  reactions: z
    .object({ results: z.array(z.unknown()).catch([]) })
    .nullable()
    .catch(null),
  entities: z.array(z.unknown()).nullable().catch(null),
});

const absentIsNull = (value: unknown) => (value === undefined ? null : value);

function pick<T>(schema: z.ZodType<T>, value: unknown): T | null {
  const parsed = schema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

/**
 * Flattens a source message into a storage-ready record. Total over its input:
 * a field that is missing or malformed becomes null/false/[], it never throws
 * as long as the message carries an integer id.
 */
export function toRecord(peerId: number, raw: RawMessage): MessageRecord {
  const source: Record<string, unknown> = {};
  for (const key of Object.keys(MessageSchema.shape)) {
    // Read through getters on class instances as well as plain properties.
    source[key] = absentIsNull(Reflect.get(raw, key));
  }

  const parsed = MessageSchema.safeParse(source);
  const message = parsed.success ? parsed.data : null;
  if (!message) {
    return Object.freeze(emptyRecord(peerId, raw.id));
  }

  const reactions = (message.reactions?.results ?? [])
    .map((entry) => pick(ReactionSchema, entry))
    .filter((entry): entry is z.infer<typeof ReactionSchema> => entry !== null)
    .map<ReactionRecord>((entry) => ({
      emoji: entry.reaction?.emoticon ?? null,
      custom_emoji_id: entry.reaction?.documentId ?? null,
      count: entry.count,
      i_reacted: entry.chosenOrder !== undefined && entry.chosenOrder !== null,
      my_reaction_order: entry.chosenOrder ?? null,
    }));

  const entities = (message.entities ?? [])
    .map((entry) => pick(EntitySchema, entry))
    .filter((entry): entry is z.infer<typeof EntitySchema> => entry !== null)
    .map<EntityRecord>((entry) => ({
      type: entry.className,
      offset: entry.offset,
      length: entry.length,
      url: entry.url ?? null,
    }));

  const record: MessageRecord = {
    id: message.id,
    chat_id: message.chatId,
    peer_id: peerId,
    date: message.date,
    text: message.text ?? message.message ?? null,
    sender_id: message.senderId,
    sender: message.sender
      ? {
          id: message.sender.id,
          username: message.sender.username,
          first_name: message.sender.firstName,
          last_name: message.sender.lastName,
          is_bot: message.sender.bot,
        }
      : null,
    edit_date: message.editDate,
    out: message.out,
    mentioned: message.mentioned,
    silent: message.silent,
    post: message.post,
    views: message.views ?? null,
    forwards: message.forwards ?? null,
    pinned: message.pinned,
    reply_to_msg_id: message.replyToMsgId ?? message.replyTo?.replyToMsgId ?? null,
    forward: message.fwdFrom
      ? {
          from_id: message.fwdFrom.fromId,
          from_name: message.fwdFrom.fromName,
          date: message.fwdFrom.date,
        }
      : null,
    has_media: message.media !== null,
    media_type: message.media?.className ?? null,
    reactions,
    entities,
  };

  return Object.freeze(record);
}

function emptyRecord(peerId: number, id: number): MessageRecord {
  return {
    id,
    chat_id: null,
    peer_id: peerId,
    date: null,
    text: null,
    sender_id: null,
    sender: null,
    edit_date: null,
    out: false,
    mentioned: false,
    silent: false,
    post: false,
    views: null,
    forwards: null,
    pinned: false,
    reply_to_msg_id: null,
    forward: null,
    has_media: false,
    media_type: null,
    reactions: [],
    entities: [],
  };
}
