import type { FormatOptions } from '../../types/format-options'
import type { VersionInfo } from '../../types/version-info'

import { FormatError } from '../errors/format-error'
import { orderFields } from './order-fields'
import { formatJson } from './format-json'
import { formatCsv } from './format-csv'
import { formatEnv } from './format-env'

/** Key prefix used when none is given. */
export const DEFAULT_ENV_PREFIX = 'VERSION_'

/**
 * Render a version snapshot in the requested format.
 *
 * @param info - Version snapshot.
 * @param options - Format and its switches.
 * @returns Text to write to stdout.
 */
export function formatVersionInfo(
  info: VersionInfo,
  options: FormatOptions,
): string {
  let fields = orderFields(options.fields)

  switch (options.format) {
    case 'json':
      return formatJson(info, fields, options.jsonPretty ?? false)
    case 'env':
      return formatEnv(info, fields, options.envPrefix ?? DEFAULT_ENV_PREFIX)
    case 'csv':
      return formatCsv(info, fields, options.csvHeader ?? false)
    default:
      throw new FormatError(String(options.format))
  }
}
