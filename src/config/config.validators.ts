/**
 * Checks whether an IANA time zone name is known to the runtime's Intl data.
 *
 * @param timeZone - Zone name such as `Europe/Berlin` or `UTC`
 * @returns True if dates can be formatted in that zone
 */
export function isValidTimeZone(timeZone: string): boolean {
  if (!timeZone.trim()) {
    return false;
  }

  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch (error) {
    // Intl throws a RangeError for unknown zones
    if (error instanceof RangeError) {
      return false;
    }
    throw error;
  }
}
