import { registerAs } from '@nestjs/config';
import * as process from 'process';
import {
  CONFIG_NAMESPACE,
  DEFAULT_SERVER_ORIGIN,
  DEFAULT_SERVER_PORT,
  DEFAULT_THROTTLE_LIMIT,
  DEFAULT_THROTTLE_TTL,
  DEFAULT_TIME_ZONE,
} from './config/config.constants';
import {
  parseFixturesPath,
  parseNumberWithDefault,
  parseStringWithDefault,
  parseTimeZone,
} from './config/config.parsers';
import type { MsgApiConfiguration } from './config/config.types';

/**
 * Build Main Server Configuration
 *
 * Optional environment variables:
 * - MSGAPI_SERVER_PORT: HTTP server port (default: 3000)
 * - MSGAPI_SERVER_ORIGIN: Allowed CORS origin (default: '*')
 * - MSGAPI_API_KEY: Key expected in the X-Server-API-Key header. When unset,
 *   every API request is refused.
 */
function buildMainConfig(): MsgApiConfiguration['main'] {
  const apiKey = process.env.MSGAPI_API_KEY?.trim();

  return {
    port: parseNumberWithDefault(process.env.MSGAPI_SERVER_PORT, DEFAULT_SERVER_PORT),
    origin: parseStringWithDefault(process.env.MSGAPI_SERVER_ORIGIN?.trim(), DEFAULT_SERVER_ORIGIN),
    apiKey: apiKey ? apiKey : undefined,
  };
}

/**
 * Build Messages Configuration
 *
 * Optional environment variables:
 * - MSGAPI_TIME_ZONE: IANA zone used to read `before`/`after` dates (default: UTC)
 * - MSGAPI_FIXTURES_PATH: JSON file of messages loaded into the store at startup
 */
function buildMessagesConfig(): MsgApiConfiguration['messages'] {
  return {
    timeZone: parseTimeZone(process.env.MSGAPI_TIME_ZONE, DEFAULT_TIME_ZONE),
    fixturesPath: parseFixturesPath(process.env.MSGAPI_FIXTURES_PATH),
  };
}

/**
 * Build API Throttling Configuration
 *
 * Optional environment variables:
 * - MSGAPI_THROTTLE_TTL: Window in milliseconds (default: 60000)
 * - MSGAPI_THROTTLE_LIMIT: Requests per window (default: 500)
 */
function buildThrottleConfig(): MsgApiConfiguration['throttle'] {
  return {
    ttl: parseNumberWithDefault(process.env.MSGAPI_THROTTLE_TTL, DEFAULT_THROTTLE_TTL),
    limit: parseNumberWithDefault(process.env.MSGAPI_THROTTLE_LIMIT, DEFAULT_THROTTLE_LIMIT),
  };
}

/**
 * Register Config
 */
export default registerAs(
  CONFIG_NAMESPACE,
  (): MsgApiConfiguration => ({
    environment: parseStringWithDefault(process.env.NODE_ENV, 'production'),
    main: buildMainConfig(),
    messages: buildMessagesConfig(),
    throttle: buildThrottleConfig(),
  }),
);
