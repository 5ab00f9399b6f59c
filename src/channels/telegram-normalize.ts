/**
 * Telegram update → InboundEvent.
 *
 * The interfaces below are the subset of the Bot API `Message` the bridge reads;
 * grammy's `Message` type is assignable to them.
 */

import type {
  AttachmentKind,
  InboundEvent,
  InboundMessage,
  MentionEntity,
  MessageBody,
  ReplyContext,
  SenderRef,
} from '../bridge/types.js';

export interface TelegramUser {
  id: number;
  first_name: string;
  last_name?: string;
  username?: string;
}

export interface TelegramEntity {
  type: string;
  offset: number;
  length: number;
  user?: TelegramUser;
}

interface TelegramFile {
  file_id: string;
  file_name?: string;
}

interface TelegramContent {
  message_id: number;
  /** Unix seconds; 0 for messages the bot cannot access. */
  date: number;
  from?: TelegramUser;
  sender_chat?: { id: number; title?: string };
  text?: string;
  caption?: string;
  entities?: TelegramEntity[];
  caption_entities?: TelegramEntity[];
  photo?: TelegramFile[];
  document?: TelegramFile;
  audio?: TelegramFile;
  voice?: TelegramFile;
  video?: TelegramFile;
  video_note?: TelegramFile;
  forum_topic_created?: object;
}

export interface TelegramMessage extends TelegramContent {
  chat: { id: number };
  edit_date?: number;
  reply_to_message?: TelegramContent;
  quote?: { text: string };
}

export interface AttachmentRef {
  kind: AttachmentKind;
  fileId: string;
  fileName?: string;
}

/** Resolves a Telegram file id to a time-limited download URL. */
export type FileLinker = (fileId: string) => Promise<string>;

const UNSUPPORTED_CONTENT = ['sticker', 'poll', 'location', 'venue', 'contact', 'dice', 'game', 'story'] as const;

/** Name of the content a message carries that cannot be forwarded, if any. */
export function unsupportedContent(msg: object): string | undefined {
  return UNSUPPORTED_CONTENT.find(key => key in msg);
}

export function isBotCommand(msg: TelegramMessage): boolean {
  return msg.entities?.some(e => e.type === 'bot_command' && e.offset === 0) ?? false;
}

export function extractAttachment(msg: TelegramContent): AttachmentRef | undefined {
  if (msg.photo && msg.photo.length > 0) {
    // Sizes are ordered smallest first
    return { kind: 'photo', fileId: msg.photo[msg.photo.length - 1].file_id };
  }
  const candidates: Array<[Exclude<AttachmentKind, 'photo'>, TelegramFile | undefined]> = [
    ['document', msg.document],
    ['video', msg.video],
    ['video_note', msg.video_note],
    ['audio', msg.audio],
    ['voice', msg.voice],
  ];
  for (const [kind, file] of candidates) {
    if (file) return { kind, fileId: file.file_id, ...(file.file_name ? { fileName: file.file_name } : {}) };
  }
  return undefined;
}

export function toSender(msg: TelegramContent): SenderRef | undefined {
  if (msg.from) return fromUser(msg.from);
  if (msg.sender_chat) {
    return { id: msg.sender_chat.id, firstName: msg.sender_chat.title ?? 'Anonymous' };
  }
  return undefined;
}

function fromUser(user: TelegramUser): SenderRef {
  return {
    id: user.id,
    firstName: user.first_name,
    ...(user.username ? { handle: user.username } : {}),
    ...(user.last_name ? { lastName: user.last_name } : {}),
  };
}

/** Keep the mentions of `text`; other entity types are formatting the bridge drops. */
export function toMentions(text: string, entities: TelegramEntity[] | undefined): MentionEntity[] {
  const mentions: MentionEntity[] = [];
  for (const e of entities ?? []) {
    if (e.type === 'mention') {
      mentions.push({ offset: e.offset, length: e.length, handle: text.slice(e.offset + 1, e.offset + e.length) });
    } else if (e.type === 'text_mention' && e.user) {
      mentions.push({ offset: e.offset, length: e.length, user: fromUser(e.user) });
    }
  }
  return mentions;
}

function toReply(msg: TelegramMessage): ReplyContext | undefined {
  const parent = msg.reply_to_message;
  // In forum groups every message "replies" to the topic's opening service message
  if (!parent || parent.forum_topic_created) return undefined;

  return {
    parent: { chatId: String(msg.chat.id), messageId: parent.message_id },
    sender: toSender(parent),
    sentAt: parent.date > 0 ? new Date(parent.date * 1000) : undefined,
    snippet: msg.quote?.text ?? parent.text ?? parent.caption ?? '',
  };
}

/**
 * Build the bridge's view of a Telegram message.
 * Returns undefined when there is nothing to forward (no sender, no text, no supported file).
 */
export async function toInboundMessage(msg: TelegramMessage, link: FileLinker): Promise<InboundMessage | undefined> {
  const sender = toSender(msg);
  if (!sender) return undefined;

  let body: MessageBody;
  const attachment = extractAttachment(msg);
  if (attachment) {
    body = {
      type: 'attachment',
      attachment: {
        kind: attachment.kind,
        url: await link(attachment.fileId),
        ...(attachment.fileName ? { fileName: attachment.fileName } : {}),
      },
      ...(msg.caption ? { caption: msg.caption } : {}),
      entities: msg.caption ? toMentions(msg.caption, msg.caption_entities) : [],
    };
  } else if (msg.text !== undefined) {
    body = { type: 'text', text: msg.text, entities: toMentions(msg.text, msg.entities) };
  } else {
    return undefined;
  }

  const reply = toReply(msg);
  return {
    key: { chatId: String(msg.chat.id), messageId: msg.message_id },
    sender,
    sentAt: new Date(msg.date * 1000),
    body,
    ...(reply ? { reply } : {}),
  };
}

export async function toInboundEvent(
  msg: TelegramMessage,
  kind: InboundEvent['kind'],
  link: FileLinker,
): Promise<InboundEvent | undefined> {
  const message = await toInboundMessage(msg, link);
  if (!message) return undefined;
  if (kind === 'new') return { kind, message };
  return { kind, message, editedAt: new Date((msg.edit_date ?? msg.date) * 1000) };
}
