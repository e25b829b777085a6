import type { GitRunner } from '../../types/git-runner'

import { findDetachedBranch } from './find-detached-branch'

/**
 * Determine the branch being built.
 *
 * Order:
 *
 * - `GITHUB_HEAD_REF` (set by GitHub Actions for pull requests).
 * - The checked out branch.
 * - For a detached HEAD, the only branch containing the commit.
 *
 * @param git - Git runner.
 * @param hash - Hash of HEAD.
 * @param env - Environment variables.
 * @returns Raw branch name.
 */
export function getBranch(
  git: GitRunner,
  hash: string,
  env: Record<string, undefined | string>,
): string {
  let fromGithub = env['GITHUB_HEAD_REF']?.trim()
  if (fromGithub) {
    return fromGithub
  }

  let branch = git(['rev-parse', '--abbrev-ref', 'HEAD'])
  if (branch.toLowerCase() === 'head') {
    return findDetachedBranch(git, hash)
  }
  return branch
}
