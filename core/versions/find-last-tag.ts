import semver from 'semver'

import type { VersionCore } from '../../types/version-core'
import type { LastTag } from '../../types/last-tag'

import { ResolutionError } from '../errors/resolution-error'
import { formatVersionCore } from './format-version-core'
import { parseTagVersion } from './parse-tag-version'

/**
 * Pick the tag with the highest version.
 *
 * Rules:
 *
 * - Only tags starting with `prefix` are considered.
 * - Without a prefix, tags that are not plain `1.2.3` versions are skipped.
 * - With a prefix, such tags are an error.
 * - Two tags with the same highest version are an error.
 *
 * @param tags - Tag names reachable from HEAD.
 * @param prefix - Literal tag prefix, possibly empty.
 * @returns Highest tag, or null when none matched.
 */
export function findLastTag(tags: string[], prefix: string): LastTag | null {
  let candidates: { version: VersionCore; parsed: string; tag: string }[] = []

  for (let tag of tags) {
    if (!tag.startsWith(prefix)) {
      continue
    }

    let version = parseTagVersion(tag, prefix)
    if (!version) {
      if (prefix === '') {
        continue
      }
      throw new ResolutionError(
        `Invalid tag format "${tag}". Expected ${prefix}1.2.3`,
      )
    }

    candidates.push({ parsed: formatVersionCore(version), version, tag })
  }

  candidates.sort((a, b) => semver.rcompare(a.parsed, b.parsed))

  let [best, next] = candidates
  if (!best) {
    return null
  }
  if (next && semver.eq(best.parsed, next.parsed)) {
    throw new ResolutionError(
      `Tags "${best.tag}" and "${next.tag}" both resolve to ${best.parsed}`,
    )
  }
  return { version: best.version, tag: best.tag }
}
