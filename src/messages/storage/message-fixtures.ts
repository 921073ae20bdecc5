import { readFileSync } from 'fs';
import { plainToInstance, Type } from 'class-transformer';
import {
  IsArray,
  IsBase64,
  IsBoolean,
  IsIn,
  IsInt,
  IsISO8601,
  IsNumber,
  IsObject,
  IsOptional,
  IsString,
  Min,
  ValidateNested,
  validateSync,
} from 'class-validator';
import {
  DELIVERY_STATUSES,
  MESSAGE_DIRECTIONS,
  MESSAGE_STATUSES,
  type Delivery,
  type DeliveryStatus,
  type Message,
  type MessageDirection,
  type MessageId,
  type MessageStatus,
} from '../interfaces';
import { IsMessageId } from '../dto/validators';
import { formatValidationErrors } from '../../shared/validation.utils';

/*
 * Fixture file layout: `{ "messages": [ ... ] }`. Dates are ISO 8601 strings,
 * the raw message and attachment bodies are base64.
 */

export class AttachmentFixtureDto {
  @IsOptional()
  @IsString()
  filename?: string;

  @IsString()
  mimeType!: string;

  @IsBase64()
  body!: string;
}

export class DeliveryFixtureDto {
  @IsInt()
  id!: number;

  @IsIn(DELIVERY_STATUSES)
  status!: DeliveryStatus;

  @IsOptional()
  @IsString()
  details?: string;

  @IsOptional()
  @IsString()
  output?: string;

  @IsOptional()
  @IsBoolean()
  sentWithSsl?: boolean;

  @IsOptional()
  @IsString()
  logId?: string;

  @IsOptional()
  @IsISO8601()
  time?: string;

  @IsISO8601()
  timestamp!: string;
}

export class MessageFixtureDto {
  @IsMessageId()
  id!: MessageId;

  @IsString()
  token!: string;

  @IsIn(MESSAGE_STATUSES)
  status!: MessageStatus;

  @IsOptional()
  @IsISO8601()
  lastDeliveryAttempt?: string;

  @IsOptional()
  @IsBoolean()
  held?: boolean;

  @IsOptional()
  @IsISO8601()
  holdExpiry?: string;

  @IsString()
  rcptTo!: string;

  @IsString()
  mailFrom!: string;

  @IsOptional()
  @IsString()
  subject?: string;

  @IsOptional()
  @IsString()
  messageId?: string;

  @IsISO8601()
  timestamp!: string;

  @IsIn(MESSAGE_DIRECTIONS)
  direction!: MessageDirection;

  @IsOptional()
  @IsBoolean()
  bounce?: boolean;

  @IsOptional()
  @IsMessageId()
  bounceForId?: MessageId;

  @IsOptional()
  @IsString()
  tag?: string;

  @IsOptional()
  @IsBoolean()
  receivedWithSsl?: boolean;

  @IsOptional()
  @IsBoolean()
  inspected?: boolean;

  @IsOptional()
  @IsBoolean()
  spam?: boolean;

  @IsOptional()
  @IsNumber()
  spamScore?: number;

  @IsOptional()
  @IsBoolean()
  threat?: boolean;

  @IsOptional()
  @IsString()
  threatDetails?: string;

  @IsOptional()
  @IsString()
  plainBody?: string;

  @IsOptional()
  @IsString()
  htmlBody?: string;

  @IsBase64()
  rawMessage!: string;

  @IsOptional()
  @IsObject()
  headers?: Record<string, unknown>;

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => AttachmentFixtureDto)
  attachments?: AttachmentFixtureDto[];

  @IsOptional()
  @IsInt()
  @Min(0)
  loads?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  clicks?: number;

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => DeliveryFixtureDto)
  deliveries?: DeliveryFixtureDto[];
}

export class MessageFixtureFileDto {
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => MessageFixtureDto)
  messages!: MessageFixtureDto[];
}

export interface MessageFixture {
  message: Message;
  deliveries: Delivery[];
}

function toOptionalDate(value: string | undefined): Date | null {
  return value ? new Date(value) : null;
}

/**
 * Header values may be written as a single string or a list of strings.
 * Anything else is dropped.
 */
function normalizeHeaders(headers: Record<string, unknown> | undefined): Record<string, string[]> {
  const normalized: Record<string, string[]> = {};

  for (const [name, value] of Object.entries(headers ?? {})) {
    if (typeof value === 'string') {
      normalized[name] = [value];
    } else if (Array.isArray(value)) {
      normalized[name] = value.filter((item): item is string => typeof item === 'string');
    }
  }

  return normalized;
}

export function toDelivery(dto: DeliveryFixtureDto): Delivery {
  return {
    id: dto.id,
    status: dto.status,
    details: dto.details ?? null,
    output: dto.output ?? null,
    sentWithSsl: dto.sentWithSsl ?? false,
    logId: dto.logId ?? null,
    time: toOptionalDate(dto.time),
    timestamp: new Date(dto.timestamp),
  };
}

export function toMessage(dto: MessageFixtureDto): Message {
  const rawMessage = Buffer.from(dto.rawMessage, 'base64');

  return {
    id: dto.id,
    token: dto.token,
    status: dto.status,
    lastDeliveryAttempt: toOptionalDate(dto.lastDeliveryAttempt),
    held: dto.held ?? false,
    holdExpiry: toOptionalDate(dto.holdExpiry),
    rcptTo: dto.rcptTo,
    mailFrom: dto.mailFrom,
    subject: dto.subject ?? null,
    messageId: dto.messageId ?? null,
    timestamp: new Date(dto.timestamp),
    direction: dto.direction,
    size: rawMessage.length,
    bounce: dto.bounce ?? false,
    bounceForId: dto.bounceForId ?? null,
    tag: dto.tag ?? null,
    receivedWithSsl: dto.receivedWithSsl ?? false,
    inspected: dto.inspected ?? false,
    spam: dto.spam ?? false,
    spamScore: dto.spamScore ?? 0,
    threat: dto.threat ?? false,
    threatDetails: dto.threatDetails ?? null,
    plainBody: dto.plainBody ?? null,
    htmlBody: dto.htmlBody ?? null,
    rawMessage,
    headers: normalizeHeaders(dto.headers),
    attachments: (dto.attachments ?? []).map((attachment) => ({
      filename: attachment.filename ?? null,
      mimeType: attachment.mimeType,
      body: Buffer.from(attachment.body, 'base64'),
    })),
    loads: dto.loads ?? 0,
    clicks: dto.clicks ?? 0,
  };
}

/**
 * Validates a parsed fixture document and maps it to store records.
 *
 * @throws {Error} Listing every validation failure if the document is malformed
 */
export function parseMessageFixtures(document: unknown): MessageFixture[] {
  if (typeof document !== 'object' || document === null || Array.isArray(document)) {
    throw new Error('Message fixtures must be a JSON object with a "messages" array');
  }

  const file = plainToInstance(MessageFixtureFileDto, document);
  const errors = validateSync(file, { whitelist: true, forbidNonWhitelisted: true });
  if (errors.length > 0) {
    throw new Error(`Invalid message fixtures: ${formatValidationErrors(errors).join('; ')}`);
  }

  return file.messages.map((dto) => ({
    message: toMessage(dto),
    deliveries: (dto.deliveries ?? []).map(toDelivery),
  }));
}

/**
 * Reads and validates a fixtures file from disk.
 */
export function loadMessageFixtures(path: string): MessageFixture[] {
  const document: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  return parseMessageFixtures(document);
}
