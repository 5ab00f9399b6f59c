/** Identifies one Telegram message for the lifetime of the bridge. */
export interface SourceMessageKey {
  chatId: string;
  messageId: number;
}

/** Zulip message id returned by a successful send. */
export type DestinationMessageKey = number;

export interface SenderRef {
  id: number;
  handle?: string;
  firstName: string;
  lastName?: string;
}

/**
 * A mention inside a message text. Offsets and lengths are UTF-16 code units,
 * the unit Telegram uses for entity boundaries.
 * `user` is set for mentions of users without a public handle.
 */
export interface MentionEntity {
  offset: number;
  length: number;
  handle?: string;
  user?: SenderRef;
}

export type AttachmentKind = 'photo' | 'audio' | 'voice' | 'video' | 'video_note' | 'document';

export interface Attachment {
  kind: AttachmentKind;
  /** Time-limited retrieval URL on the source platform. */
  url: string;
  fileName?: string;
}

export type MessageBody =
  | { type: 'text'; text: string; entities: MentionEntity[] }
  | { type: 'attachment'; attachment: Attachment; caption?: string; entities: MentionEntity[] };

/** Parent of a reply, resolved by the source client and passed through untouched. */
export interface ReplyContext {
  parent: SourceMessageKey;
  sender?: SenderRef;
  sentAt?: Date;
  snippet: string;
}

export interface InboundMessage {
  key: SourceMessageKey;
  sender: SenderRef;
  sentAt: Date;
  body: MessageBody;
  reply?: ReplyContext;
}

export type InboundEvent =
  | { kind: 'new'; message: InboundMessage }
  | { kind: 'edit'; message: InboundMessage; editedAt: Date };

export interface CorrelationRecord {
  source: SourceMessageKey;
  destination: DestinationMessageKey;
  sourceSentAt: Date;
  sender: SenderRef;
}

export interface StreamTarget {
  stream: string;
  topic: string;
}

export interface DestinationClient {
  create(target: StreamTarget, markup: string, signal?: AbortSignal): Promise<DestinationMessageKey>;
  edit(id: DestinationMessageKey, markup: string, signal?: AbortSignal): Promise<void>;
}

export type DropReason =
  | 'unknown_correlation'
  | 'edit_window_exceeded'
  | 'delivery_failed'
  | 'cancelled';

export type BridgeOutcome =
  | { status: 'forwarded'; destination: DestinationMessageKey }
  | { status: 'edited'; destination: DestinationMessageKey }
  | { status: 'duplicate' }
  | { status: 'dropped'; reason: DropReason; error?: string };

export function formatKey(key: SourceMessageKey): string {
  return `${key.chatId}/${key.messageId}`;
}
