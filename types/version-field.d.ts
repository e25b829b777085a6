import type { VersionInfo } from './version-info'

/** Name of a single `VersionInfo` field. */
export type VersionField = keyof VersionInfo

/** Value held by any `VersionInfo` field. */
export type VersionValue = VersionInfo[VersionField]
