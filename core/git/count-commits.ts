import type { GitRunner } from '../../types/git-runner'

import { ResolutionError } from '../errors/resolution-error'

/**
 * Count commits between a tag (exclusive) and HEAD (inclusive).
 *
 * Without a tag every commit reachable from HEAD is counted.
 *
 * @param git - Git runner.
 * @param tag - Last tag, or null when none matched.
 * @returns Number of commits.
 */
export function countCommits(git: GitRunner, tag: string | null): number {
  let args = tag
    ? ['rev-list', '--ancestry-path', '--count', `refs/tags/${tag}..HEAD`]
    : ['rev-list', '--count', 'HEAD']

  let output = git(args)
  if (!/^\d+$/u.test(output)) {
    throw new ResolutionError(`Unexpected commit count "${output}"`)
  }
  return Number.parseInt(output, 10)
}
