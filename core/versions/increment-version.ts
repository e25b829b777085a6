import semver from 'semver'

import type { IncrementKind } from '../../types/increment-kind'
import type { VersionCore } from '../../types/version-core'

import { ConfigurationError } from '../errors/configuration-error'
import { formatVersionCore } from './format-version-core'

/**
 * Advance one component; lower components reset to zero.
 *
 * @param version - Base version.
 * @param increment - Component to advance.
 * @returns Next version.
 */
export function incrementVersion(
  version: VersionCore,
  increment: IncrementKind,
): VersionCore {
  let next = semver.inc(formatVersionCore(version), increment)
  if (!next) {
    throw new ConfigurationError(
      `Invalid increment "${String(increment)}". Expected "major", "minor", or "patch".`,
    )
  }
  return {
    major: semver.major(next),
    minor: semver.minor(next),
    patch: semver.patch(next),
  }
}
