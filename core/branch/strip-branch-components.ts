import { ConfigurationError } from '../errors/configuration-error'

/**
 * Drop leading `/`-separated components, e.g. `dev/name/feature` with 2
 * becomes `feature`.
 *
 * @param branch - Branch name.
 * @param count - Components to drop; zero keeps the name.
 * @returns Remaining branch name.
 */
export function stripBranchComponents(branch: string, count: number): string {
  if (count <= 0) {
    return branch
  }

  let parts = branch.split('/')
  if (parts.length <= count) {
    throw new ConfigurationError(
      `Cannot strip ${count} components from branch "${branch}"`,
    )
  }
  return parts.slice(count).join('/')
}
