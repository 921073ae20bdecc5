import { existsSync } from 'fs';
import { resolve } from 'path';
import { isValidTimeZone } from './config.validators';

export function parseNumberWithDefault(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value === '') {
    return defaultValue;
  }

  const parsed = Number(value);

  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new Error(`Invalid numeric value: "${value}" (must be a non-negative finite number)`);
  }

  // Ports, timeouts and limits are whole numbers
  if (!Number.isInteger(parsed)) {
    throw new Error(`Invalid numeric value: "${value}" (must be an integer)`);
  }

  return parsed;
}

/**
 * Parses a string environment variable with a default value.
 *
 * @param value - The string value to parse
 * @param defaultValue - The default value to return if not provided
 * @returns The value or default
 */
export function parseStringWithDefault(value: string | undefined, defaultValue: string): string {
  if (value === undefined || value === '') {
    return defaultValue;
  }
  return value;
}

/**
 * Parses the time zone used to interpret `before`/`after` date filters.
 *
 * @throws {Error} If the zone is not a known IANA zone name
 * @example
 * ```
 * MSGAPI_TIME_ZONE=Europe/London
 * // Returns: 'Europe/London'
 * ```
 */
export function parseTimeZone(value: string | undefined, defaultValue: string): string {
  const timeZone = parseStringWithDefault(value?.trim(), defaultValue);

  if (!isValidTimeZone(timeZone)) {
    throw new Error(`Invalid MSGAPI_TIME_ZONE: "${timeZone}". Use an IANA zone name such as "Europe/London"`);
  }

  return timeZone;
}

/**
 * Resolves the optional message fixtures file.
 *
 * Returns undefined when no path is configured, so the store starts empty.
 *
 * @throws {Error} If a path is configured but no file exists there
 */
export function parseFixturesPath(value: string | undefined): string | undefined {
  if (!value || !value.trim()) {
    return undefined;
  }

  const fullPath = resolve(value.trim());
  if (!existsSync(fullPath)) {
    throw new Error(`MSGAPI_FIXTURES_PATH points to a missing file: ${fullPath}`);
  }

  return fullPath;
}
