import { describe, it, expect, vi } from 'vitest';
import {
  extractAttachment,
  isBotCommand,
  toInboundEvent,
  toInboundMessage,
  toMentions,
  toSender,
  unsupportedContent,
  type TelegramMessage,
} from '../../src/channels/telegram-normalize.js';

const alice = { id: 1, first_name: 'Alice', username: 'alice' };
const bob = { id: 7, first_name: 'Bob' };

// 2024-03-05T10:00:00Z
const T0 = 1709632800;

function tgMessage(fields: Partial<TelegramMessage> = {}): TelegramMessage {
  return { message_id: 10, date: T0, chat: { id: -1001 }, from: bob, ...fields };
}

const link = vi.fn(async (fileId: string) => `https://files.example/${fileId}`);

describe('toMentions', () => {
  it('should keep @handle mentions and drop formatting entities', () => {
    const text = 'Hi @alice, *look*';
    const mentions = toMentions(text, [
      { type: 'mention', offset: 3, length: 6 },
      { type: 'bold', offset: 11, length: 6 },
    ]);
    expect(mentions).toEqual([{ offset: 3, length: 6, handle: 'alice' }]);
  });

  it('should carry the user of a text mention', () => {
    const mentions = toMentions('Thanks Bob', [{ type: 'text_mention', offset: 7, length: 3, user: bob }]);
    expect(mentions).toEqual([{ offset: 7, length: 3, user: { id: 7, firstName: 'Bob' } }]);
  });
});

describe('toSender', () => {
  it('should map a user with handle and last name', () => {
    expect(toSender(tgMessage({ from: { id: 9, first_name: 'Carol', last_name: 'Jones', username: 'cj' } }))).toEqual({
      id: 9, firstName: 'Carol', lastName: 'Jones', handle: 'cj',
    });
  });

  it('should fall back to the sending chat for anonymous admins', () => {
    expect(toSender(tgMessage({ from: undefined, sender_chat: { id: -1001, title: 'Team' } }))).toEqual({ id: -1001, firstName: 'Team' });
  });
});

describe('extractAttachment', () => {
  it('should pick the largest photo size', () => {
    const msg = tgMessage({ photo: [{ file_id: 'small' }, { file_id: 'medium' }, { file_id: 'large' }] });
    expect(extractAttachment(msg)).toEqual({ kind: 'photo', fileId: 'large' });
  });

  it('should keep the file name of a document', () => {
    expect(extractAttachment(tgMessage({ document: { file_id: 'd1', file_name: 'report.pdf' } }))).toEqual({
      kind: 'document', fileId: 'd1', fileName: 'report.pdf',
    });
  });

  it('should recognise voice notes', () => {
    expect(extractAttachment(tgMessage({ voice: { file_id: 'v1' } }))).toEqual({ kind: 'voice', fileId: 'v1' });
  });

  it('should return undefined for a text message', () => {
    expect(extractAttachment(tgMessage({ text: 'hi' }))).toBeUndefined();
  });
});

describe('unsupportedContent', () => {
  it('should name stickers and polls', () => {
    expect(unsupportedContent({ ...tgMessage(), sticker: { file_id: 's' } })).toBe('sticker');
    expect(unsupportedContent({ ...tgMessage(), poll: { question: 'Lunch?' } })).toBe('poll');
  });

  it('should accept plain text', () => {
    expect(unsupportedContent(tgMessage({ text: 'hi' }))).toBeUndefined();
  });
});

describe('isBotCommand', () => {
  it('should detect a leading command', () => {
    expect(isBotCommand(tgMessage({ text: '/help', entities: [{ type: 'bot_command', offset: 0, length: 5 }] }))).toBe(true);
    expect(isBotCommand(tgMessage({ text: 'see /help', entities: [{ type: 'bot_command', offset: 4, length: 5 }] }))).toBe(false);
  });
});

describe('toInboundMessage', () => {
  it('should build a text message', async () => {
    const msg = await toInboundMessage(tgMessage({ text: 'Hello @alice', entities: [{ type: 'mention', offset: 6, length: 6 }] }), link);
    expect(msg).toEqual({
      key: { chatId: '-1001', messageId: 10 },
      sender: { id: 7, firstName: 'Bob' },
      sentAt: new Date('2024-03-05T10:00:00Z'),
      body: { type: 'text', text: 'Hello @alice', entities: [{ offset: 6, length: 6, handle: 'alice' }] },
    });
  });

  it('should build an attachment with its caption mentions', async () => {
    const msg = await toInboundMessage(tgMessage({
      photo: [{ file_id: 'p1' }],
      caption: '@alice look',
      caption_entities: [{ type: 'mention', offset: 0, length: 6 }],
    }), link);

    expect(msg?.body).toEqual({
      type: 'attachment',
      attachment: { kind: 'photo', url: 'https://files.example/p1' },
      caption: '@alice look',
      entities: [{ offset: 0, length: 6, handle: 'alice' }],
    });
  });

  it('should attach the replied-to message, preferring the quoted part', async () => {
    const msg = await toInboundMessage(tgMessage({
      text: 'Yes',
      reply_to_message: { message_id: 9, date: T0 - 60, from: alice, text: 'Lunch? Or dinner?' },
      quote: { text: 'Lunch?' },
    }), link);

    expect(msg?.reply).toEqual({
      parent: { chatId: '-1001', messageId: 9 },
      sender: { id: 1, firstName: 'Alice', handle: 'alice' },
      sentAt: new Date('2024-03-05T09:59:00Z'),
      snippet: 'Lunch?',
    });
  });

  it('should use the caption of a replied-to file', async () => {
    const msg = await toInboundMessage(tgMessage({
      text: 'nice',
      reply_to_message: { message_id: 9, date: T0, from: alice, photo: [{ file_id: 'p' }], caption: 'sunset' },
    }), link);
    expect(msg?.reply?.snippet).toBe('sunset');
  });

  it('should leave the time out for an inaccessible parent', async () => {
    const msg = await toInboundMessage(tgMessage({
      text: 'what?',
      reply_to_message: { message_id: 9, date: 0 },
    }), link);
    expect(msg?.reply).toEqual({ parent: { chatId: '-1001', messageId: 9 }, sender: undefined, sentAt: undefined, snippet: '' });
  });

  it('should ignore the implicit reply to a forum topic', async () => {
    const msg = await toInboundMessage(tgMessage({
      text: 'hi',
      reply_to_message: { message_id: 2, date: T0, from: alice, forum_topic_created: { name: 'General' } },
    }), link);
    expect(msg?.reply).toBeUndefined();
  });

  it('should return undefined when there is nothing to forward', async () => {
    expect(await toInboundMessage(tgMessage(), link)).toBeUndefined();
    expect(await toInboundMessage(tgMessage({ from: undefined, text: 'ghost' }), link)).toBeUndefined();
  });
});

describe('toInboundEvent', () => {
  it('should stamp an edit with its edit date', async () => {
    const event = await toInboundEvent(tgMessage({ text: 'fixed', edit_date: T0 + 120 }), 'edit', link);
    expect(event).toMatchObject({ kind: 'edit', editedAt: new Date('2024-03-05T10:02:00Z') });
  });

  it('should not stamp a new message', async () => {
    const event = await toInboundEvent(tgMessage({ text: 'hi' }), 'new', link);
    expect(event?.kind).toBe('new');
    expect(event && 'editedAt' in event).toBe(false);
  });
});
