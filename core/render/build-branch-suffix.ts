/** Branches whose versions carry no suffix. */
const RELEASE_BRANCHES = new Set(['main', 'master'])

/**
 * Build the `<separator><branch>.<commits>` suffix for pre-release and local
 * version renderings.
 *
 * @param branch - Sanitized branch name.
 * @param commits - Commits since the last tag.
 * @param separator - `-` for semver and NuGet, `+` for PEP 440.
 * @returns Suffix, empty on main and master.
 */
export function buildBranchSuffix(
  branch: string,
  commits: number,
  separator: '+' | '-',
): string {
  if (RELEASE_BRANCHES.has(branch)) {
    return ''
  }
  return `${separator}${branch}.${commits}`
}
