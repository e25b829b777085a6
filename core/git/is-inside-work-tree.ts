import type { GitRunner } from '../../types/git-runner'

import { ResolutionError } from '../errors/resolution-error'

/**
 * Check whether git runs inside a working tree.
 *
 * @param git - Git runner.
 * @returns True when `git rev-parse --is-inside-work-tree` reports `true`.
 */
export function isInsideWorkTree(git: GitRunner): boolean {
  try {
    return git(['rev-parse', '--is-inside-work-tree']) === 'true'
  } catch (error) {
    if (error instanceof ResolutionError) {
      return false
    }
    throw error
  }
}
