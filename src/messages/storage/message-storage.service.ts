import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Delivery, Message, MessageFilter, MessageId, MessageQuery, MessageRepository } from '../interfaces';
import { MessageRecordNotFoundError } from '../errors/messages.errors';
import { loadMessageFixtures } from './message-fixtures';

interface StoredMessage {
  message: Message;
  deliveries: Delivery[];
}

function matchesFilter(message: Message, where: MessageFilter): boolean {
  if (where.rcpt_to !== undefined && message.rcptTo !== where.rcpt_to) {
    return false;
  }
  if (where.mail_from !== undefined && message.mailFrom !== where.mail_from) {
    return false;
  }

  const timestamp = message.timestamp.getTime() / 1000;
  if (where.timestamp?.less_than !== undefined && !(timestamp < where.timestamp.less_than)) {
    return false;
  }
  if (where.timestamp?.greater_than !== undefined && !(timestamp > where.timestamp.greater_than)) {
    return false;
  }

  return true;
}

/**
 * In-memory message store.
 *
 * Ids are keyed by their string form, so `101` and `"101"` find the same
 * message. Seeded from MSGAPI_FIXTURES_PATH at startup when configured.
 */
@Injectable()
export class MessageStorageService implements MessageRepository, OnModuleInit {
  private readonly logger = new Logger(MessageStorageService.name);
  private messages: Map<string, StoredMessage> = new Map();

  /* v8 ignore next - false positive on constructor parameter property */
  constructor(private readonly configService: ConfigService) {}

  onModuleInit(): void {
    const fixturesPath = this.configService.get<string>('msgapi.messages.fixturesPath');
    if (!fixturesPath) {
      this.logger.log('No message fixtures configured, starting with an empty store');
      return;
    }

    const fixtures = loadMessageFixtures(fixturesPath);
    for (const { message, deliveries } of fixtures) {
      this.addMessage(message, deliveries);
    }
    this.logger.log(`Loaded ${fixtures.length} message(s) from ${fixturesPath}`);
  }

  /**
   * Add or replace a message together with its delivery attempts
   */
  addMessage(message: Message, deliveries: Delivery[] = []): void {
    this.messages.set(String(message.id), { message, deliveries: [...deliveries] });
    this.logger.debug(`Message ${message.id} stored with ${deliveries.length} deliveries`);
  }

  find(id: MessageId): Promise<Message> {
    const stored = this.messages.get(String(id));
    if (!stored) {
      return Promise.reject(new MessageRecordNotFoundError(id));
    }
    return Promise.resolve(stored.message);
  }

  /**
   * Filter and sort by timestamp. Messages with equal timestamps keep their
   * insertion order.
   */
  list(query: MessageQuery): Promise<Message[]> {
    const sign = query.direction === 'desc' ? -1 : 1;
    const matched = Array.from(this.messages.values())
      .map((stored) => stored.message)
      .filter((message) => matchesFilter(message, query.where))
      .sort((a, b) => sign * (a.timestamp.getTime() - b.timestamp.getTime()));

    return Promise.resolve(matched);
  }

  deliveries(messageId: MessageId): Promise<Delivery[]> {
    const stored = this.messages.get(String(messageId));
    return Promise.resolve(stored ? [...stored.deliveries] : []);
  }

  /**
   * Get total number of stored messages
   */
  getMessageCount(): number {
    return this.messages.size;
  }

  /**
   * Remove every message (testing/maintenance)
   */
  clear(): number {
    const count = this.messages.size;
    this.messages.clear();
    this.logger.warn(`All messages cleared, removed ${count}`);
    return count;
  }
}
