import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc';
import timezone from 'dayjs/plugin/timezone';
import customParseFormat from 'dayjs/plugin/customParseFormat';
import { InvalidDateFormatError } from '../errors/messages.errors';
import type { TimestampRange } from '../interfaces';
import { isBlank } from '../../shared/params.utils';

dayjs.extend(utc);
dayjs.extend(timezone);
dayjs.extend(customParseFormat);

// yyyy-mm-dd, optionally followed by a single space and hh:mm
const TIME_BOUND_PATTERN = /^\d{4}-\d{2}-\d{2}( \d{2}:\d{2})?$/;
const TIME_BOUND_FORMATS = ['YYYY-MM-DD', 'YYYY-MM-DD HH:mm'];

/**
 * Parses a `before`/`after` filter value in the given IANA time zone.
 *
 * @param value - `yyyy-mm-dd` or `yyyy-mm-dd hh:mm`
 * @param parameter - Request parameter name, used in the error message
 * @param timeZone - Zone the wall-clock value is read in
 * @returns Epoch seconds
 * @throws {InvalidDateFormatError} If the value has any other shape, or names
 *   a date or time that does not exist
 */
export function parseTimeBound(value: string, parameter: string, timeZone: string): number {
  if (!TIME_BOUND_PATTERN.test(value)) {
    throw new InvalidDateFormatError(parameter);
  }

  // Strict parsing rejects out-of-range fields such as month 13 or 25:99.
  // Checked in UTC, where every wall-clock time exists.
  if (!TIME_BOUND_FORMATS.some((format) => dayjs.utc(value, format, true).isValid())) {
    throw new InvalidDateFormatError(parameter);
  }

  return dayjs.tz(value, timeZone).valueOf() / 1000;
}

/**
 * Builds the timestamp range for a message query. `before` is checked
 * first, so a request with two bad bounds reports `before`.
 *
 * @returns undefined when neither bound was supplied
 */
export function buildTimestampRange(
  before: string | null | undefined,
  after: string | null | undefined,
  timeZone: string,
): TimestampRange | undefined {
  const range: TimestampRange = {};

  if (typeof before === 'string' && !isBlank(before)) {
    range.less_than = parseTimeBound(before, 'before', timeZone);
  }
  if (typeof after === 'string' && !isBlank(after)) {
    range.greater_than = parseTimeBound(after, 'after', timeZone);
  }

  return Object.keys(range).length > 0 ? range : undefined;
}
