import { z } from 'zod';
import { toIdentifier, toIdentifierText } from '../utils/identifiers';

export interface InputPeerSummary {
  type: string;
  user_id?: string;
  chat_id?: string;
  channel_id?: string;
  access_hash?: string;
}

export interface DialogSummary {
  title: string;
  id: number | null;
  username: string | null;
  type: string;
  peer_id: number | null;
  is_self: boolean;
  is_bot: boolean;
  deleted: boolean;
  participants_count: number | null;
  megagroup: boolean | null;
  broadcast: boolean | null;
  input_peer: InputPeerSummary | null;
}

const text = z.string().min(1).nullable().catch(null);
const flag = z.boolean().catch(false);
const optionalFlag = z.boolean().nullable().catch(null);

const EntitySchema = z.object({
  className: z.string().catch('Unknown'),
  id: z.unknown().transform(toIdentifier),
  title: text,
  firstName: text,
  username: text,
  self: flag,
  bot: flag,
  deleted: flag,
  participantsCount: z.number().int().nullable().catch(null),
  megagroup: optionalFlag,
  broadcast: optionalFlag,
});

function readFields(value: object, keys: string[]): Record<string, unknown> {
  const fields: Record<string, unknown> = {};
  for (const key of keys) {
    const field = Reflect.get(value, key);
    fields[key] = field === undefined ? null : field;
  }
  return fields;
}

export function describeInputPeer(inputPeer: object | null): InputPeerSummary | null {
  if (!inputPeer) return null;
  const fields = readFields(inputPeer, ['className', 'userId', 'chatId', 'channelId', 'accessHash']);
  const summary: InputPeerSummary = {
    type: typeof fields.className === 'string' ? fields.className : 'Unknown',
  };
  const userId = toIdentifierText(fields.userId);
  const chatId = toIdentifierText(fields.chatId);
  const channelId = toIdentifierText(fields.channelId);
  const accessHash = toIdentifierText(fields.accessHash);
  if (userId !== null) summary.user_id = userId;
  if (chatId !== null) summary.chat_id = chatId;
  if (channelId !== null) summary.channel_id = channelId;
  if (accessHash !== null) summary.access_hash = accessHash;
  return summary;
}

export function describeDialog(entity: object, peerId: number | null, inputPeer: object | null): DialogSummary {
  // Every field carries a fallback, so parsing a field map cannot fail.
  const fields = EntitySchema.parse(readFields(entity, Object.keys(EntitySchema.shape)));

  return {
    title: fields.title ?? fields.firstName ?? 'NoTitle',
    id: fields.id,
    username: fields.username,
    type: fields.className,
    peer_id: peerId,
    is_self: fields.self,
    is_bot: fields.bot,
    deleted: fields.deleted,
    participants_count: fields.participantsCount,
    megagroup: fields.megagroup,
    broadcast: fields.broadcast,
    input_peer: describeInputPeer(inputPeer),
  };
}

export function formatDialog(dialog: DialogSummary): string[] {
  const lines = [
    dialog.title,
    `  ID: ${dialog.id ?? 'None'}`,
    `  Username: ${dialog.username ?? 'None'}`,
    `  Type: ${dialog.type}`,
    `  PeerID: ${dialog.peer_id ?? 'None'}`,
  ];
  if (dialog.is_self) lines.push('  This is your own account');
  if (dialog.is_bot) lines.push('  Bot account');
  if (dialog.deleted) lines.push('  Deleted account');
  if (dialog.participants_count !== null) lines.push(`  Participants: ${dialog.participants_count}`);
  if (dialog.megagroup) lines.push('  Supergroup');
  if (dialog.broadcast) lines.push('  Channel');
  if (dialog.input_peer) {
    const { type, ...ids } = dialog.input_peer;
    const rendered = Object.entries(ids)
      .map(([key, value]) => `${key}=${value}`)
      .join(', ');
    lines.push(`  InputPeer: ${type} (${rendered})`);
  }
  lines.push('-'.repeat(40));
  return lines;
}
