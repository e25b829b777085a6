import type { OutputFormat } from '../../types/output-format'

/**
 * Check whether the value names a supported output format.
 *
 * @param value - Raw value.
 * @returns True for `json`, `env` or `csv`.
 */
export function isOutputFormat(value: unknown): value is OutputFormat {
  return value === 'json' || value === 'env' || value === 'csv'
}
