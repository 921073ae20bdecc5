import { Module } from '@nestjs/common';
import { TerminusModule } from '@nestjs/terminus';
import { HealthController } from './health.controller';
import { MessageStoreHealthIndicator } from './message-store.health';
import { MessagesModule } from '../messages/messages.module';

/**
 * The HealthModule provides health check endpoints for the application.
 */
@Module({
  imports: [TerminusModule, MessagesModule],
  controllers: [HealthController],
  providers: [MessageStoreHealthIndicator],
})
export class HealthModule {}
