import { HealthIndicatorService } from '@nestjs/terminus';
import { ConfigService } from '@nestjs/config';
import { MessageStoreHealthIndicator } from '../message-store.health';
import { MessageStorageService } from '../../messages/storage/message-storage.service';
import { createMessage } from '../../../test/helpers/message-factory';
import { silenceNestLogger } from '../../../test/helpers/silence-logger';

describe('MessageStoreHealthIndicator', () => {
  let storage: MessageStorageService;
  let indicator: MessageStoreHealthIndicator;
  let restoreLogger: () => void;

  beforeEach(() => {
    restoreLogger = silenceNestLogger();
    storage = new MessageStorageService(new ConfigService());
    indicator = new MessageStoreHealthIndicator(storage, new HealthIndicatorService());
  });

  afterEach(() => {
    restoreLogger();
  });

  it('should report up with an empty store', async () => {
    await expect(indicator.isHealthy('messageStore')).resolves.toEqual({
      messageStore: { status: 'up', messages: 0 },
    });
  });

  it('should report the number of stored messages', async () => {
    storage.addMessage(createMessage({ id: 1 }));
    storage.addMessage(createMessage({ id: 2 }));

    await expect(indicator.isHealthy('messageStore')).resolves.toEqual({
      messageStore: { status: 'up', messages: 2 },
    });
  });
});
