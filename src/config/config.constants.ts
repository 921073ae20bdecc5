// Configuration defaults
export const DEFAULT_SERVER_PORT = 3000;
export const DEFAULT_SERVER_ORIGIN = '*';
export const DEFAULT_TIME_ZONE = 'UTC';
export const DEFAULT_THROTTLE_TTL = 60000;
export const DEFAULT_THROTTLE_LIMIT = 500;

export const CONFIG_NAMESPACE = 'msgapi';
