/**
 * Format a date as compact UTC ISO-8601, e.g. `20240502T101530Z`.
 *
 * @param date - Date to format.
 * @returns Timestamp without separators or milliseconds.
 */
export function formatTimestamp(date: Date): string {
  return date
    .toISOString()
    .replace(/\.\d{3}Z$/u, 'Z')
    .replace(/[-:]/gu, '')
}
