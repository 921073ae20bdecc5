/**
 * Configuration type definition for type-safe access
 */
export interface MsgApiConfiguration {
  environment: string;
  main: {
    port: number;
    origin: string;
    apiKey?: string;
  };
  messages: {
    timeZone: string;
    fixturesPath?: string;
  };
  throttle: {
    ttl: number;
    limit: number;
  };
}
