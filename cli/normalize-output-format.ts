import type { OutputFormat } from '../types/output-format'

import { isOutputFormat } from '../core/format/is-output-format'
import { FormatError } from '../core/errors/format-error'

/**
 * Normalizes the format option.
 *
 * @param format - Raw option value.
 * @returns Output format, `json` when omitted.
 */
export function normalizeOutputFormat(
  format: undefined | string | number,
): OutputFormat {
  let normalized = String(format ?? 'json').toLowerCase()
  if (isOutputFormat(normalized)) {
    return normalized
  }
  throw new FormatError(String(format))
}
