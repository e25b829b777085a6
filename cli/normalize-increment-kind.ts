import type { IncrementKind } from '../types/increment-kind'

import { ConfigurationError } from '../core/errors/configuration-error'
import { isIncrementKind } from '../core/versions/is-increment-kind'

/**
 * Normalizes the increment argument.
 *
 * @param increment - Raw positional argument.
 * @returns Increment kind.
 */
export function normalizeIncrementKind(
  increment: undefined | string | number,
): IncrementKind {
  let normalized = String(increment ?? '').toLowerCase()
  if (isIncrementKind(normalized)) {
    return normalized
  }
  throw new ConfigurationError(
    `Invalid increment "${String(increment)}". Expected "major", "minor", or "patch".`,
  )
}
