import { Module } from '@nestjs/common';
import { MessagesController } from './messages.controller';
import { MessagesService } from './messages.service';
import { MessageStorageService } from './storage/message-storage.service';
import { MessagesEnvelopeInterceptor } from './envelope/messages-envelope.interceptor';
import { ServerApiKeyGuard } from './guards/server-api-key.guard';
import { MESSAGE_REPOSITORY } from './messages.tokens';

@Module({
  controllers: [MessagesController],
  providers: [
    MessagesService,
    MessageStorageService,
    { provide: MESSAGE_REPOSITORY, useExisting: MessageStorageService },
    MessagesEnvelopeInterceptor,
    ServerApiKeyGuard,
  ],
  exports: [MessagesService, MessageStorageService],
})
export class MessagesModule {}
