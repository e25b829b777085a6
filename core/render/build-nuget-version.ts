import { buildBranchSuffix } from './build-branch-suffix'

/** Longest version NuGet accepts for pre-release packages. */
const NUGET_MAX_LENGTH = 20

/**
 * Render a NuGet package version.
 *
 * Versions over 20 characters keep their first and last 10 characters.
 *
 * @param semver - Dotted version.
 * @param branch - Sanitized branch name.
 * @param commits - Commits since the last tag.
 * @returns NuGet version.
 */
export function buildNugetVersion(
  semver: string,
  branch: string,
  commits: number,
): string {
  let version = `${semver}${buildBranchSuffix(branch, commits, '-')}`
  if (version.length <= NUGET_MAX_LENGTH) {
    return version
  }
  let half = NUGET_MAX_LENGTH / 2
  return version.slice(0, half) + version.slice(-half)
}
