import type { VersionContext } from '../types/version-context'
import type { VersionInfo } from '../types/version-info'
import type { GitRunner } from '../types/git-runner'

import { stripBranchComponents } from './branch/strip-branch-components'
import { sanitizeBranchName } from './branch/sanitize-branch-name'
import { formatVersionCore } from './versions/format-version-core'
import { ConfigurationError } from './errors/configuration-error'
import { buildNugetVersion } from './render/build-nuget-version'
import { buildBranchSuffix } from './render/build-branch-suffix'
import { incrementVersion } from './versions/increment-version'
import { isIncrementKind } from './versions/is-increment-kind'
import { isInsideWorkTree } from './git/is-inside-work-tree'
import { formatTimestamp } from './render/format-timestamp'
import { listMergedTags } from './git/list-merged-tags'
import { findLastTag } from './versions/find-last-tag'
import { countCommits } from './git/count-commits'
import { getHeadHash } from './git/get-head-hash'
import { getTagHash } from './git/get-tag-hash'
import { getBranch } from './branch/get-branch'

/**
 * Compute the next version of the repository from its tags.
 *
 * Reads git metadata only; nothing in the repository is changed.
 *
 * @param context - Increment, tag prefix and branch options.
 * @param git - Git runner bound to the repository.
 * @returns Frozen version snapshot.
 */
export function resolveVersion(
  context: VersionContext,
  git: GitRunner,
): VersionInfo {
  let {
    stripBranchComponents: stripCount = 0,
    now = () => new Date(),
    env = process.env,
    tagPrefix = '',
    increment,
  } = context

  if (!isIncrementKind(increment)) {
    throw new ConfigurationError(
      `Invalid increment "${String(increment)}". Expected "major", "minor", or "patch".`,
    )
  }

  if (!isInsideWorkTree(git)) {
    throw new ConfigurationError('Not inside a git working tree')
  }

  let timestamp = formatTimestamp(now())
  let hash = getHeadHash(git)

  let lastTag = findLastTag(listMergedTags(git, tagPrefix), tagPrefix)
  let lastHash = lastTag ? getTagHash(git, lastTag.tag) : null
  let commits = countCommits(git, lastTag?.tag ?? null)

  let branch = sanitizeBranchName(
    stripBranchComponents(getBranch(git, hash, env), stripCount),
  )

  let next = incrementVersion(
    lastTag?.version ?? { major: 0, minor: 0, patch: 0 },
    increment,
  )
  let semver = formatVersionCore(next)

  return Object.freeze({
    major: next.major,
    minor: next.minor,
    patch: next.patch,
    commits,
    hash,
    branch,
    last_tag: lastTag?.tag ?? null,
    last_hash: lastHash,
    tag: `${tagPrefix}${semver}`,
    tag_prefix: tagPrefix,
    semver,
    semver_full: `${semver}${buildBranchSuffix(branch, commits, '-')}`,
    pep440: `${semver}${buildBranchSuffix(branch, commits, '+')}`,
    nuget: buildNugetVersion(semver, branch, commits),
    timestamp,
  })
}
