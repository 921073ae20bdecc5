/**
 * True for request values that count as "not supplied": undefined, null,
 * and strings that are empty or whitespace only.
 */
export function isBlank(value: unknown): boolean {
  if (value === undefined || value === null) {
    return true;
  }
  return typeof value === 'string' && value.trim() === '';
}
