import type { VersionField } from '../../types/version-field'

import { VERSION_FIELDS } from './version-fields'

/**
 * Check whether the value names a `VersionInfo` field.
 *
 * @param value - Raw value.
 * @returns True for a known field name.
 */
export function isVersionField(value: string): value is VersionField {
  return VERSION_FIELDS.some(field => field === value)
}
