import type { VersionField } from '../../types/version-field'

import { VERSION_FIELDS } from './version-fields'

/**
 * Put a field selection into the fixed output order, dropping duplicates.
 *
 * @param fields - Selected fields, all fields when omitted.
 * @returns Fields in output order.
 */
export function orderFields(fields?: readonly VersionField[]): VersionField[] {
  if (!fields) {
    return [...VERSION_FIELDS]
  }
  return VERSION_FIELDS.filter(field => fields.includes(field))
}
