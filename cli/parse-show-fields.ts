import type { VersionField } from '../types/version-field'

import { ConfigurationError } from '../core/errors/configuration-error'
import { isVersionField } from '../core/format/is-version-field'
import { VERSION_FIELDS } from '../core/format/version-fields'

/**
 * Parses the comma-separated `--show` option.
 *
 * @param show - Raw option value; `all` or absent selects every field.
 * @returns Selected fields, or undefined for all of them.
 */
export function parseShowFields(
  show: undefined | string,
): VersionField[] | undefined {
  if (show === undefined || show.trim() === '' || show.trim() === 'all') {
    return undefined
  }

  let fields: VersionField[] = []
  for (let rawField of show.split(',')) {
    let field = rawField.trim()
    if (!field) {
      continue
    }
    if (!isVersionField(field)) {
      throw new ConfigurationError(
        `Field "${field}" not found. Valid fields are: ${VERSION_FIELDS.join(',')}`,
      )
    }
    fields.push(field)
  }
  return fields
}
