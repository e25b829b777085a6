import type { GitRunner } from '../../types/git-runner'

import { ResolutionError } from '../errors/resolution-error'
import { isCommitHash } from './is-commit-hash'

/**
 * Resolve the commit a tag points to, peeling annotated tags.
 *
 * @param git - Git runner.
 * @param tag - Tag name.
 * @returns Commit hash.
 */
export function getTagHash(git: GitRunner, tag: string): string {
  let hash = git(['rev-list', '-n', '1', `refs/tags/${tag}`])
  if (!isCommitHash(hash)) {
    throw new ResolutionError(`Tag "${tag}" does not point to a commit`)
  }
  return hash
}
