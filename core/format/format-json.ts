import type { VersionField, VersionValue } from '../../types/version-field'
import type { VersionInfo } from '../../types/version-info'

/**
 * Render fields as a JSON object; absent values become `null`.
 *
 * @param info - Version snapshot.
 * @param fields - Fields in output order.
 * @param pretty - Indent with four spaces.
 * @returns JSON text ending with a newline.
 */
export function formatJson(
  info: VersionInfo,
  fields: VersionField[],
  pretty: boolean,
): string {
  let values: Record<string, VersionValue> = {}
  for (let field of fields) {
    values[field] = info[field]
  }
  return `${JSON.stringify(values, null, pretty ? 4 : undefined)}\n`
}
