import { Injectable } from '@nestjs/common';
import { HealthIndicatorService } from '@nestjs/terminus';
import { MessageStorageService } from '../messages/storage/message-storage.service';

/**
 * Reports the message store as up along with how many messages it holds.
 */
@Injectable()
export class MessageStoreHealthIndicator {
  constructor(
    private readonly storageService: MessageStorageService,
    private readonly healthIndicatorService: HealthIndicatorService,
  ) {}

  isHealthy(key: string) {
    const indicator = this.healthIndicatorService.check(key);

    return Promise.resolve(indicator.up({ messages: this.storageService.getMessageCount() }));
  }
}
