import type { GitRunner } from '../../types/git-runner'

import { ResolutionError } from '../errors/resolution-error'
import { isCommitHash } from './is-commit-hash'

/**
 * Read the full hash of HEAD.
 *
 * @param git - Git runner.
 * @returns Commit hash.
 */
export function getHeadHash(git: GitRunner): string {
  let hash: string
  try {
    hash = git(['rev-parse', '--verify', 'HEAD'])
  } catch (error) {
    if (error instanceof ResolutionError) {
      throw new ResolutionError(
        `Unable to read HEAD, the repository may have no commits (${error.message})`,
      )
    }
    throw error
  }

  if (!isCommitHash(hash)) {
    throw new ResolutionError(`Unexpected HEAD hash "${hash}"`)
  }
  return hash
}
