import type { VersionCore } from '../../types/version-core'

/**
 * Render version components as `major.minor.patch`.
 *
 * @param version - Version components.
 * @returns Dotted version.
 */
export function formatVersionCore(version: VersionCore): string {
  return `${version.major}.${version.minor}.${version.patch}`
}
