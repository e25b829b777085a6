import { ConfigurationError } from '../core/errors/configuration-error'

/**
 * Parses the `--strip-branch-components` option.
 *
 * @param value - Raw option value.
 * @returns Non-negative component count, zero when omitted.
 */
export function parseStripCount(
  value: undefined | boolean | string | number,
): number {
  if (value === undefined || value === false) {
    return 0
  }
  let count = Number(value)
  if (typeof value === 'boolean' || !Number.isInteger(count) || count < 0) {
    throw new ConfigurationError(
      `Invalid branch component count "${String(value)}". Expected a non-negative integer.`,
    )
  }
  return count
}
