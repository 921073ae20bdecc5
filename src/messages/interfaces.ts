export type MessageId = string | number;

export const MESSAGE_STATUSES = ['Pending', 'Sent', 'Held', 'SoftFail', 'HardFail', 'Bounced'] as const;
export type MessageStatus = (typeof MESSAGE_STATUSES)[number];

export const DELIVERY_STATUSES = ['Sent', 'SoftFail', 'HardFail', 'Held', 'Bounced', 'Processed'] as const;
export type DeliveryStatus = (typeof DELIVERY_STATUSES)[number];

export const MESSAGE_DIRECTIONS = ['inbound', 'outbound'] as const;
export type MessageDirection = (typeof MESSAGE_DIRECTIONS)[number];

export interface Attachment {
  filename?: string | null;
  mimeType: string;
  body: Buffer | string;
}

/**
 * A message as read from the store. The core never mutates it; status and
 * inspection fields are owned by the delivery pipeline.
 */
export interface Message {
  readonly id: MessageId;
  token: string;

  // Status
  status: MessageStatus;
  lastDeliveryAttempt: Date | null;
  held: boolean;
  holdExpiry: Date | null;

  // Envelope and content details
  rcptTo: string;
  mailFrom: string;
  subject: string | null;
  messageId: string | null;
  timestamp: Date;
  direction: MessageDirection;
  size: number;
  bounce: boolean;
  bounceForId: MessageId | null;
  tag: string | null;
  receivedWithSsl: boolean;

  // Inspection
  inspected: boolean;
  spam: boolean;
  spamScore: number;
  threat: boolean;
  threatDetails: string | null;

  plainBody: string | null;
  htmlBody: string | null;
  rawMessage: Buffer;
  headers: Record<string, string[]>;
  attachments: Attachment[];

  // Activity
  loads: number;
  clicks: number;
}

export interface Delivery {
  id: number;
  status: DeliveryStatus;
  details: string | null;
  output: string | null;
  sentWithSsl: boolean;
  logId: string | null;
  time: Date | null;
  timestamp: Date;
}

/**
 * Bounds are epoch seconds; both are exclusive.
 */
export interface TimestampRange {
  less_than?: number;
  greater_than?: number;
}

/**
 * Column filter handed to the store. Keys follow the store's column names.
 */
export interface MessageFilter {
  rcpt_to?: string;
  mail_from?: string;
  timestamp?: TimestampRange;
}

export interface MessageQuery {
  where: MessageFilter;
  order: 'timestamp';
  direction: 'asc' | 'desc';
}

/**
 * Read access to stored messages.
 *
 * `find` rejects with `MessageRecordNotFoundError` when no message has the id.
 * `deliveries` returns the message's delivery attempts in stored order.
 */
export interface MessageRepository {
  find(id: MessageId): Promise<Message>;
  list(query: MessageQuery): Promise<Message[]>;
  deliveries(messageId: MessageId): Promise<Delivery[]>;
}
