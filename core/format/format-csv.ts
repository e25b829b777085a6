import type { VersionField, VersionValue } from '../../types/version-field'
import type { VersionInfo } from '../../types/version-info'

/**
 * Render fields as a comma-separated row, optionally after a header row.
 *
 * @param info - Version snapshot.
 * @param fields - Fields in output order.
 * @param header - Emit field names first.
 * @returns CSV text ending with a newline.
 */
export function formatCsv(
  info: VersionInfo,
  fields: VersionField[],
  header: boolean,
): string {
  let row = fields.map(field => renderCsvValue(info[field])).join(',')
  return header ? `${fields.join(',')}\n${row}\n` : `${row}\n`
}

/**
 * Quote a value per RFC 4180 when it needs it.
 *
 * @param value - Field value.
 * @returns CSV cell.
 */
function renderCsvValue(value: VersionValue): string {
  if (value === null) {
    return ''
  }
  let text = String(value)
  if (/[\n\r",]/u.test(text)) {
    return `"${text.replaceAll('"', '""')}"`
  }
  return text
}
