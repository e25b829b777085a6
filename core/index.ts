export type { VersionField, VersionValue } from '../types/version-field'
export type { VersionContext } from '../types/version-context'
export type { IncrementKind } from '../types/increment-kind'
export type { FormatOptions } from '../types/format-options'
export type { OutputFormat } from '../types/output-format'
export type { VersionInfo } from '../types/version-info'
export type { GitRunner } from '../types/git-runner'

export {
  DEFAULT_ENV_PREFIX,
  formatVersionInfo,
} from './format/format-version-info'
export { ConfigurationError } from './errors/configuration-error'
export { ResolutionError } from './errors/resolution-error'
export { createGitRunner } from './git/create-git-runner'
export { VERSION_FIELDS } from './format/version-fields'
export { FormatError } from './errors/format-error'
export { resolveVersion } from './resolve-version'
