import { describe, expect, it } from 'vitest'

import { normalizeIncrementKind } from '../../cli/normalize-increment-kind'
import { ConfigurationError } from '../../core/errors/configuration-error'

describe('normalizeIncrementKind', () => {
  it('returns minor for minor', () => {
    expect(normalizeIncrementKind('minor')).toBe('minor')
  })

  it('handles uppercase input', () => {
    expect(normalizeIncrementKind('MAJOR')).toBe('major')
  })

  it('handles mixed case input', () => {
    expect(normalizeIncrementKind('Patch')).toBe('patch')
  })

  it('throws for invalid increment', () => {
    expect(() => normalizeIncrementKind('invalid')).toThrowError(
      'Invalid increment "invalid". Expected "major", "minor", or "patch".',
    )
  })

  it('throws ConfigurationError for a missing increment', () => {
    expect(() => normalizeIncrementKind(undefined)).toThrowError(
      ConfigurationError,
    )
  })

  it('throws for numeric input', () => {
    expect(() => normalizeIncrementKind(1)).toThrowError(
      'Invalid increment "1". Expected "major", "minor", or "patch".',
    )
  })
})
