/**
 * Read an option cac may have parsed as a number, e.g. `--tag-prefix 2`.
 *
 * @param value - Raw option value.
 * @param fallback - Value used when the option is absent.
 * @returns Option as a string.
 */
export function readStringOption(
  value: undefined | boolean | string | number,
  fallback: string,
): string {
  if (value === undefined || typeof value === 'boolean') {
    return fallback
  }
  return String(value)
}
