import type { GitRunner } from '../../types/git-runner'

import { ResolutionError } from '../errors/resolution-error'

/**
 * Find the single local branch containing a commit checked out detached.
 *
 * @param git - Git runner.
 * @param hash - Commit checked out at HEAD.
 * @returns Branch name.
 */
export function findDetachedBranch(git: GitRunner, hash: string): string {
  let branches = git(['branch', '--contains', hash])
    .split(/\r?\n/u)
    .map(line => line.replace(/^[*+]/u, '').trim())
    .filter(line => line !== '' && !line.includes('HEAD'))

  let [branch, ...others] = branches
  if (!branch) {
    throw new ResolutionError(
      `No branch found for ${hash}. Could not determine branch name`,
    )
  }
  if (others.length > 0) {
    throw new ResolutionError(
      `Multiple branches found for ${hash} (${branches.join(', ')}). ` +
        'Could not determine branch name',
    )
  }
  return branch
}
