import type { VersionField } from '../../types/version-field'

/** Field order shared by every output format. */
export const VERSION_FIELDS = [
  'major',
  'minor',
  'patch',
  'commits',
  'hash',
  'branch',
  'last_tag',
  'last_hash',
  'tag',
  'tag_prefix',
  'semver',
  'semver_full',
  'pep440',
  'nuget',
  'timestamp',
] as const satisfies readonly VersionField[]
