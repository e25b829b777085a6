/**
 * Snapshot of the next version, produced once per run.
 *
 * Keys are the names used verbatim by every output format.
 */
export interface VersionInfo {
  /** Next major component. */
  readonly major: number

  /** Next minor component. */
  readonly minor: number

  /** Next patch component. */
  readonly patch: number

  /** Commits since `last_tag`, or all commits when there is no tag yet. */
  readonly commits: number

  /** Full hash of HEAD. */
  readonly hash: string

  /** Sanitized branch name. */
  readonly branch: string

  /** Highest matching tag reachable from HEAD. */
  readonly last_tag: string | null

  /** Commit the last tag points to. */
  readonly last_hash: string | null

  /** Tag to create for this version (`tag_prefix` + `semver`). */
  readonly tag: string

  /** Prefix used to match and build tags, possibly empty. */
  readonly tag_prefix: string

  /** Dotted `major.minor.patch`. */
  readonly semver: string

  /** Semver with a `-<branch>.<commits>` suffix outside main/master. */
  readonly semver_full: string

  /** PEP 440 rendering, using a `+` local version label off main/master. */
  readonly pep440: string

  /** NuGet rendering, shortened to 20 characters. */
  readonly nuget: string

  /** UTC creation time, e.g. `20240502T101530Z`. */
  readonly timestamp: string
}
