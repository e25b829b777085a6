import type { IncrementKind } from '../../types/increment-kind'

/**
 * Check whether the value names a version component.
 *
 * @param value - Raw value.
 * @returns True for `major`, `minor` or `patch`.
 */
export function isIncrementKind(value: unknown): value is IncrementKind {
  return value === 'major' || value === 'minor' || value === 'patch'
}
