import { Logger } from '@nestjs/common';
import type { MsgApiConfiguration } from './config.types';

/* c8 ignore start */
/**
 * Log Configuration Summary
 *
 * Logs a summary of the loaded configuration for debugging purposes.
 * The API key is never printed, only whether one is set.
 *
 * @param config - The complete configuration object
 */
export function logConfigurationSummary(config: MsgApiConfiguration): void {
  const summaryLogger = new Logger('Configuration');

  summaryLogger.log(`Environment: ${config.environment}`);
  summaryLogger.log(`HTTP Server: port ${config.main.port}`);
  summaryLogger.log(`CORS Origin: ${config.main.origin}`);
  summaryLogger.log(`Server API Key: ${config.main.apiKey ? 'configured' : 'NOT configured (all requests refused)'}`);
  summaryLogger.log(`Date Filter Time Zone: ${config.messages.timeZone}`);
  summaryLogger.log(`Message Fixtures: ${config.messages.fixturesPath ?? 'none (empty store)'}`);
  summaryLogger.log(`API Rate Limiting: ${config.throttle.limit} requests per ${config.throttle.ttl}ms`);

  summaryLogger.log('Configuration loaded successfully');
}
/* c8 ignore stop */
