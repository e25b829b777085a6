import type { GitRunner } from '../../types/git-runner'

/**
 * List tags reachable from HEAD that start with the given prefix.
 *
 * The prefix is matched as a literal string. Prefixes containing glob
 * characters are filtered here instead of by git.
 *
 * @param git - Git runner.
 * @param prefix - Literal tag prefix, possibly empty.
 * @returns Tag names in git's order.
 */
export function listMergedTags(git: GitRunner, prefix: string): string[] {
  let args = ['tag', '--merged', 'HEAD', '--list']
  if (prefix && !/[*?[\\]/u.test(prefix)) {
    args.push(`${prefix}*`)
  }

  return git(args)
    .split(/\r?\n/u)
    .map(line => line.trim())
    .filter(tag => tag !== '' && tag.startsWith(prefix))
}
