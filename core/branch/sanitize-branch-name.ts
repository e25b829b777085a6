/**
 * Replace every character outside `[a-zA-Z0-9]` with `-`.
 *
 * @param branch - Branch name.
 * @returns Name safe for version suffixes.
 */
export function sanitizeBranchName(branch: string): string {
  return branch.replace(/[^a-zA-Z0-9]/gu, '-')
}
