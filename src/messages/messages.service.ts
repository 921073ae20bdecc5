import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DEFAULT_TIME_ZONE } from '../config/config.constants';
import { isBlank } from '../shared/params.utils';
import { MessageNotFoundError, MessageRecordNotFoundError, ParameterError } from './errors/messages.errors';
import { parseExpansionDirective, type ExpansionDirectiveInput } from './expansions/expansion-directive';
import { buildMessageQuery, type MessageListFilters } from './filters/message-query.builder';
import type { Message, MessageId, MessageRepository } from './interfaces';
import { MESSAGE_REPOSITORY } from './messages.tokens';
import {
  projectDelivery,
  projectMessage,
  type DeliveryProjection,
  type MessageProjection,
} from './projection/message-projection';

export interface MessageListParams extends MessageListFilters {
  expansions?: ExpansionDirectiveInput;
}

@Injectable()
export class MessagesService {
  private readonly logger = new Logger(MessagesService.name);
  private readonly timeZone: string;

  /**
   * Reads the zone used for `before`/`after` filters from `msgapi.messages.timeZone`.
   */
  constructor(
    @Inject(MESSAGE_REPOSITORY) private readonly repository: MessageRepository,
    private readonly configService: ConfigService,
  ) {
    this.timeZone = this.configService.get<string>('msgapi.messages.timeZone', DEFAULT_TIME_ZONE);
    this.logger.log(`MessagesService initialized: timeZone=${this.timeZone}`);
  }

  /**
   * Look up one message and project it with the requested expansions.
   *
   * @throws {ParameterError} If `id` is blank; the store is not queried
   * @throws {MessageNotFoundError} If no message has this id
   */
  async getMessage(id: MessageId | null | undefined, expansions?: ExpansionDirectiveInput): Promise<MessageProjection> {
    const messageId = this.requireMessageId(id);
    const directive = parseExpansionDirective(expansions);
    const message = await this.findMessage(messageId);

    return projectMessage(message, directive);
  }

  /**
   * List the delivery attempts of one message in stored order.
   *
   * @throws {ParameterError} If `id` is blank; the store is not queried
   * @throws {MessageNotFoundError} If no message has this id
   */
  async getDeliveries(id: MessageId | null | undefined): Promise<DeliveryProjection[]> {
    const messageId = this.requireMessageId(id);
    const message = await this.findMessage(messageId);
    const deliveries = await this.repository.deliveries(message.id);

    return deliveries.map(projectDelivery);
  }

  /**
   * List messages matching the filters, newest first.
   *
   * Without an `_expansions` directive only the ids are returned. With one
   * (`true` or any array, even empty) every message is projected the same
   * way `getMessage` would project it.
   *
   * @throws {InvalidDateFormatError} If `before` or `after` is malformed; the store is not queried
   */
  async listMessages(params: MessageListParams): Promise<MessageId[] | MessageProjection[]> {
    const query = buildMessageQuery(params, this.timeZone);
    const directive = parseExpansionDirective(params.expansions);
    const messages = await this.repository.list(query);

    this.logger.debug(`Message list matched ${messages.length} message(s)`);

    if (directive.kind === 'absent') {
      return messages.map((message) => message.id);
    }
    return messages.map((message) => projectMessage(message, directive));
  }

  private requireMessageId(id: MessageId | null | undefined): MessageId {
    if (id === null || id === undefined || isBlank(id)) {
      throw new ParameterError('`id` parameter is required but is missing');
    }
    return id;
  }

  /**
   * Translates the store's not-found error; any other failure propagates as is.
   */
  private async findMessage(id: MessageId): Promise<Message> {
    try {
      return await this.repository.find(id);
    } catch (error) {
      if (error instanceof MessageRecordNotFoundError) {
        throw new MessageNotFoundError(id);
      }
      throw error;
    }
  }
}
