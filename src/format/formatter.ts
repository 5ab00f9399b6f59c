import type { Attachment, AttachmentKind, InboundMessage, MentionEntity, MessageBody, ReplyContext, SenderRef } from '../bridge/types.js';
import type { IdentityResolver } from '../users/identity-resolver.js';
import { substituteMentions } from './mentions.js';
import { zonedStamp } from './time.js';

const LINK_LABELS: Record<Exclude<AttachmentKind, 'photo'>, string> = {
  audio: 'Link to audio',
  voice: 'Link to voice note',
  video: 'Link to video',
  video_note: 'Link to video note',
  document: 'Link to file',
};

export interface FormatterOptions {
  /** IANA zone used for quote headers and date topics. */
  timeZone: string;
}

type UsableReply = ReplyContext & { sender: SenderRef; sentAt: Date };

/** A reply whose parent has no sender or no valid timestamp is rendered as a plain message. */
export function isReplyContextUsable(reply: ReplyContext): reply is UsableReply {
  return reply.sender !== undefined && reply.sentAt !== undefined && !Number.isNaN(reply.sentAt.getTime());
}

/**
 * Renders inbound Telegram messages as Zulip markdown.
 *
 *   > *Bob (10:00):*
 *   > original text
 *
 *   *Alice:*
 *   reply text
 */
export class ContentFormatter {
  private readonly resolver: IdentityResolver;
  private readonly timeZone: string;

  constructor(resolver: IdentityResolver, opts: FormatterOptions) {
    this.resolver = resolver;
    this.timeZone = opts.timeZone;
  }

  render(msg: InboundMessage): string {
    return this.compose(msg, this.resolver.display(msg.sender), msg.sentAt);
  }

  /**
   * Re-render an edited message. Label and quote header come from the stored
   * correlation so that only the editable body differs from the first send.
   */
  renderEdit(msg: InboundMessage, originalSenderDisplay: string, originalSentAt: Date): string {
    return this.compose(msg, originalSenderDisplay, originalSentAt);
  }

  private compose(msg: InboundMessage, senderDisplay: string, sentAt: Date): string {
    const blocks: string[] = [];
    if (msg.reply && isReplyContextUsable(msg.reply)) {
      blocks.push(this.quote(msg.reply, sentAt));
    }
    blocks.push(`*${senderDisplay}:*\n${this.body(msg.body)}`);
    return blocks.join('\n\n');
  }

  private quote(reply: UsableReply, replySentAt: Date): string {
    const parent = zonedStamp(reply.sentAt, this.timeZone);
    const current = zonedStamp(replySentAt, this.timeZone);
    const when = parent.date === current.date ? parent.time : `${parent.date}, ${parent.time}`;

    const lines = [`> *${this.resolver.display(reply.sender)} (${when}):*`];
    if (reply.snippet) {
      for (const line of reply.snippet.split('\n')) {
        lines.push(line ? `> ${line}` : '>');
      }
    }
    return lines.join('\n');
  }

  private body(body: MessageBody): string {
    switch (body.type) {
      case 'text':
        return this.withMentions(body.text, body.entities);
      case 'attachment': {
        const parts: string[] = [];
        if (body.caption) parts.push(this.withMentions(body.caption, body.entities));
        parts.push(attachmentLink(body.attachment));
        return parts.join('\n');
      }
      default: {
        const unhandled: never = body;
        throw new Error(`Unhandled message body: ${JSON.stringify(unhandled)}`);
      }
    }
  }

  private withMentions(text: string, entities: MentionEntity[]): string {
    return substituteMentions(text, entities, (entity) => {
      const form = entity.user
        ? this.resolver.resolve(entity.user)
        : entity.handle
          ? this.resolver.resolveHandle(entity.handle)
          : undefined;
      // Misses keep the text the sender actually typed
      if (!form || form.kind === 'plain') return undefined;
      return this.resolver.toMarkup(form);
    });
  }
}

export function attachmentLink(attachment: Attachment): string {
  if (attachment.kind === 'photo') return `[](${attachment.url})`;
  const label = attachment.fileName ? attachment.fileName.replace(/[[\]]/g, '') : LINK_LABELS[attachment.kind];
  return `[${label}](${attachment.url})`;
}
