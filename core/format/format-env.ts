import type { VersionField, VersionValue } from '../../types/version-field'
import type { VersionInfo } from '../../types/version-info'

/**
 * Render fields as `PREFIX_KEY=value` lines a shell can source.
 *
 * Strings are double-quoted, numbers bare, absent values empty.
 *
 * @param info - Version snapshot.
 * @param fields - Fields in output order.
 * @param prefix - Key prefix, upper-cased.
 * @returns One line per field.
 */
export function formatEnv(
  info: VersionInfo,
  fields: VersionField[],
  prefix: string,
): string {
  let keyPrefix = prefix.toUpperCase()
  return fields
    .map(
      field =>
        `${keyPrefix}${field.toUpperCase()}=${renderEnvValue(info[field])}\n`,
    )
    .join('')
}

/**
 * Quote a value for a double-quoted shell string.
 *
 * @param value - Field value.
 * @returns Shell-safe rendering.
 */
function renderEnvValue(value: VersionValue): string {
  if (value === null) {
    return ''
  }
  if (typeof value === 'number') {
    return String(value)
  }
  return `"${value.replace(/[$"\\`]/gu, char => `\\${char}`)}"`
}
