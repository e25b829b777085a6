import type { VersionCore } from './version-core'

/** Most recent matching tag together with its parsed version. */
export interface LastTag {
  /** Parsed numeric components. */
  version: VersionCore

  /** Full tag name, prefix included. */
  tag: string
}
