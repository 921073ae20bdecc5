import { createHash } from 'crypto';
import type { Attachment, Delivery, DeliveryStatus, Message, MessageDirection, MessageId, MessageStatus } from '../interfaces';
import {
  EXPANSION_GROUPS,
  isExpansionActive,
  type ExpansionDirective,
  type ExpansionGroup,
} from '../expansions/expansion-directive';

export interface StatusExpansion {
  status: MessageStatus;
  last_delivery_attempt: number | null;
  held: boolean;
  hold_expiry: number | null;
}

export interface DetailsExpansion {
  rcpt_to: string;
  mail_from: string;
  subject: string | null;
  message_id: string | null;
  timestamp: number;
  direction: MessageDirection;
  size: number;
  bounce: boolean;
  bounce_for_id: MessageId | null;
  tag: string | null;
  received_with_ssl: boolean;
}

export interface InspectionExpansion {
  inspected: boolean;
  spam: boolean;
  spam_score: number;
  threat: boolean;
  threat_details: string | null;
}

export interface AttachmentProjection {
  filename: string;
  content_type: string;
  data: string;
  size: number;
  hash: string;
}

export interface ActivityExpansion {
  loads: number;
  clicks: number;
}

export interface ExpansionGroupMap {
  status: StatusExpansion;
  details: DetailsExpansion;
  inspection: InspectionExpansion;
  plain_body: string | null;
  html_body: string | null;
  attachments: AttachmentProjection[];
  headers: Record<string, string[]>;
  raw_message: string;
  activity_entries: ActivityExpansion;
}

export type MessageProjection = { id: MessageId; token: string } & Partial<ExpansionGroupMap>;

export interface DeliveryProjection {
  id: number;
  status: DeliveryStatus;
  details: string | null;
  output: string | null;
  sent_with_ssl: boolean;
  log_id: string | null;
  time: number | null;
  timestamp: number;
}

type ExpansionBuilders = { [G in ExpansionGroup]: (message: Message) => ExpansionGroupMap[G] };

function toEpochSeconds(date: Date): number {
  return date.getTime() / 1000;
}

function toOptionalEpochSeconds(date: Date | null): number | null {
  return date ? toEpochSeconds(date) : null;
}

/**
 * Base64 in 60-character lines, each ending in a newline. Empty input
 * encodes to an empty string.
 */
export function encodeBase64Lines(bytes: Buffer): string {
  const encoded = bytes.toString('base64');
  if (!encoded) {
    return '';
  }
  return encoded.replace(/.{60}/g, '$&\n').replace(/\n?$/, '\n');
}

/**
 * Encodes and hashes the attachment body. Recomputed on every call so the
 * digest always matches the bytes currently stored.
 */
export function projectAttachment(attachment: Attachment): AttachmentProjection {
  const body = Buffer.isBuffer(attachment.body) ? attachment.body : Buffer.from(attachment.body);

  return {
    filename: attachment.filename ?? '',
    content_type: attachment.mimeType,
    data: encodeBase64Lines(body),
    size: body.length,
    hash: createHash('sha1').update(body).digest('hex'),
  };
}

const EXPANSION_BUILDERS: ExpansionBuilders = {
  status: (message) => ({
    status: message.status,
    last_delivery_attempt: toOptionalEpochSeconds(message.lastDeliveryAttempt),
    held: message.held,
    hold_expiry: toOptionalEpochSeconds(message.holdExpiry),
  }),
  details: (message) => ({
    rcpt_to: message.rcptTo,
    mail_from: message.mailFrom,
    subject: message.subject,
    message_id: message.messageId,
    timestamp: toEpochSeconds(message.timestamp),
    direction: message.direction,
    size: message.size,
    bounce: message.bounce,
    bounce_for_id: message.bounceForId,
    tag: message.tag,
    received_with_ssl: message.receivedWithSsl,
  }),
  inspection: (message) => ({
    inspected: message.inspected,
    spam: message.spam,
    spam_score: Number(message.spamScore),
    threat: message.threat,
    threat_details: message.threatDetails,
  }),
  plain_body: (message) => message.plainBody,
  html_body: (message) => message.htmlBody,
  attachments: (message) => message.attachments.map(projectAttachment),
  headers: (message) => message.headers,
  raw_message: (message) => encodeBase64Lines(message.rawMessage),
  activity_entries: (message) => ({
    loads: message.loads,
    clicks: message.clicks,
  }),
};

function expandGroup<G extends ExpansionGroup>(
  target: Partial<ExpansionGroupMap>,
  group: G,
  message: Message,
): void {
  target[group] = EXPANSION_BUILDERS[group](message);
}

/**
 * Projects a message for the API: `id` and `token` always, then one key per
 * group the directive selects, in EXPANSION_GROUPS order. Builders for
 * unselected groups never run, so attachment encoding only happens when
 * `attachments` is requested.
 */
export function projectMessage(message: Message, directive: ExpansionDirective): MessageProjection {
  const projection: MessageProjection = { id: message.id, token: message.token };

  for (const group of EXPANSION_GROUPS) {
    if (isExpansionActive(directive, group)) {
      expandGroup(projection, group, message);
    }
  }

  return projection;
}

export function projectDelivery(delivery: Delivery): DeliveryProjection {
  return {
    id: delivery.id,
    status: delivery.status,
    details: delivery.details,
    output: delivery.output?.trim() ?? null,
    sent_with_ssl: delivery.sentWithSsl,
    log_id: delivery.logId,
    time: toOptionalEpochSeconds(delivery.time),
    timestamp: toEpochSeconds(delivery.timestamp),
  };
}
