import { Controller, Get } from '@nestjs/common';
import { HealthCheck, HealthCheckService } from '@nestjs/terminus';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { MessageStoreHealthIndicator } from './message-store.health';

/**
 * Controller for handling health checks.
 */
@ApiTags('Health')
@Controller('health')
export class HealthController {
  constructor(
    private readonly health: HealthCheckService,
    private readonly messageStore: MessageStoreHealthIndicator,
  ) {}

  /**
   * Performs a health check.
   * @returns A promise that resolves to the health check result.
   */
  @Get()
  @HealthCheck()
  @ApiOperation({
    summary: 'Get Application Health Status',
    description: 'Reports the HTTP server and the message store.',
  })
  @ApiResponse({ status: 200, description: 'The application is healthy.' })
  @ApiResponse({ status: 503, description: 'One or more health checks failed.' })
  check() {
    return this.health.check([
      () => Promise.resolve({ server: { status: 'up' } }),
      () => this.messageStore.isHealthy('messageStore'),
    ]);
  }
}
