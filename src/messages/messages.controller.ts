import { Body, Controller, HttpCode, HttpStatus, Logger, Post, UseGuards, UseInterceptors } from '@nestjs/common';
import { ApiOkResponse, ApiOperation, ApiResponse, ApiSecurity, ApiTags } from '@nestjs/swagger';
import { MessagesService } from './messages.service';
import { ServerApiKeyGuard } from './guards/server-api-key.guard';
import { MessagesEnvelopeInterceptor } from './envelope/messages-envelope.interceptor';
import { MessageListDto, MessageLookupDto } from './dto/message-request.dto';
import { DeliveriesEnvelopeDto, MessageEnvelopeDto, MessageListEnvelopeDto } from './dto/response.dto';
import type { MessageId } from './interfaces';
import type { DeliveryProjection, MessageProjection } from './projection/message-projection';

@ApiTags('Messages')
@ApiSecurity('server-api-key')
@Controller('api/v1/messages')
@UseInterceptors(MessagesEnvelopeInterceptor)
export class MessagesController {
  private readonly logger = new Logger(MessagesController.name);

  constructor(private readonly messagesService: MessagesService) {}

  /**
   * POST /api/v1/messages/message
   * Returns one message, expanded as requested
   * Requires X-Server-API-Key header
   */
  @Post('message')
  @UseGuards(ServerApiKeyGuard)
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Get a message',
    description: 'Returns `id` and `token`, plus every expansion group named in `_expansions`.',
  })
  @ApiOkResponse({ type: MessageEnvelopeDto, description: 'The message, or a parameter/MessageNotFound error.' })
  @ApiResponse({ status: 401, description: 'Unauthorized, API key is missing or invalid.' })
  getMessage(@Body() body: MessageLookupDto): Promise<MessageProjection> {
    this.logger.debug('POST /api/v1/messages/message');

    return this.messagesService.getMessage(body.id, body._expansions);
  }

  /**
   * POST /api/v1/messages/deliveries
   * Returns every delivery attempt of a message
   * Requires X-Server-API-Key header
   */
  @Post('deliveries')
  @UseGuards(ServerApiKeyGuard)
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'List the deliveries of a message' })
  @ApiOkResponse({ type: DeliveriesEnvelopeDto, description: 'The deliveries, or a parameter/MessageNotFound error.' })
  @ApiResponse({ status: 401, description: 'Unauthorized, API key is missing or invalid.' })
  getDeliveries(@Body() body: MessageLookupDto): Promise<DeliveryProjection[]> {
    this.logger.debug('POST /api/v1/messages/deliveries');

    return this.messagesService.getDeliveries(body.id);
  }

  /**
   * POST /api/v1/messages/list
   * Lists messages by recipient, sender and time window, newest first
   * Requires X-Server-API-Key header
   */
  @Post('list')
  @UseGuards(ServerApiKeyGuard)
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'List messages',
    description: 'Returns message IDs, or full projections when `_expansions` is given.',
  })
  @ApiOkResponse({ type: MessageListEnvelopeDto, description: 'The matching messages, or a parameter error.' })
  @ApiResponse({ status: 401, description: 'Unauthorized, API key is missing or invalid.' })
  listMessages(@Body() body: MessageListDto): Promise<MessageId[] | MessageProjection[]> {
    this.logger.debug('POST /api/v1/messages/list');

    return this.messagesService.listMessages({
      to: body.to,
      from: body.from,
      before: body.before,
      after: body.after,
      expansions: body._expansions,
    });
  }
}
