import type { OutputFormat } from './output-format'
import type { VersionField } from './version-field'

/** Options controlling how a `VersionInfo` is rendered. */
export interface FormatOptions {
  /** Subset of fields to emit. Always rendered in the fixed field order. */
  fields?: readonly VersionField[]

  /** Indent JSON output over several lines. */
  jsonPretty?: boolean

  /** Emit a row of field names before the CSV values. */
  csvHeader?: boolean

  /** Prefix for env keys, upper-cased. Defaults to `VERSION_`. */
  envPrefix?: string

  /** Output format. */
  format: OutputFormat
}
