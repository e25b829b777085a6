import type { IncrementKind } from './increment-kind'

/** Inputs of a single version resolution. */
export interface VersionContext {
  /**
   * Environment used for CI overrides such as `GITHUB_HEAD_REF`. Defaults to
   * `process.env`.
   */
  env?: Record<string, undefined | string>

  /** Number of leading `/`-separated branch components to drop. */
  stripBranchComponents?: number

  /** Component to advance. */
  increment: IncrementKind

  /** Clock for the `timestamp` field. Defaults to the current time. */
  now?: () => Date

  /** Literal prefix tags must start with, e.g. `myservice-v`. */
  tagPrefix?: string
}
