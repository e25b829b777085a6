import type { VersionCore } from '../../types/version-core'

/**
 * Parse the `major.minor.patch` part of a tag.
 *
 * @param tag - Full tag name.
 * @param prefix - Prefix the tag starts with.
 * @returns Version components, or null when the rest of the tag is not three
 *   dot-separated numbers.
 */
export function parseTagVersion(
  tag: string,
  prefix: string,
): VersionCore | null {
  if (!tag.startsWith(prefix)) {
    return null
  }

  let match = tag
    .slice(prefix.length)
    .match(/^(?<major>\d+)\.(?<minor>\d+)\.(?<patch>\d+)$/u)
  if (!match?.groups) {
    return null
  }

  let major = Number(match.groups['major'])
  let minor = Number(match.groups['minor'])
  let patch = Number(match.groups['patch'])
  if (![major, minor, patch].every(Number.isSafeInteger)) {
    return null
  }
  return { major, minor, patch }
}
