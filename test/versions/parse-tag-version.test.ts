import { describe, expect, it } from 'vitest'

import { parseTagVersion } from '../../core/versions/parse-tag-version'

describe('parseTagVersion', () => {
  it('parses a plain version', () => {
    expect(parseTagVersion('1.2.3', '')).toEqual({
      major: 1,
      minor: 2,
      patch: 3,
    })
  })

  it('parses the part after the prefix', () => {
    expect(parseTagVersion('myservice-v0.4.0', 'myservice-v')).toEqual({
      major: 0,
      minor: 4,
      patch: 0,
    })
  })

  it('reads leading zeros as numbers', () => {
    expect(parseTagVersion('1.02.3', '')).toEqual({
      major: 1,
      minor: 2,
      patch: 3,
    })
  })

  it.each([
    ['hello-vabc', 'hello-v'],
    ['hello-va.b.c', 'hello-v'],
    ['hello-v1.b.c', 'hello-v'],
    ['hello-v1.2.c', 'hello-v'],
    ['hello-v1.2', 'hello-v'],
    ['hello-v1.2.3.4', 'hello-v'],
    ['v1.2.3', ''],
    ['1.2.3-rc.1', ''],
    ['other-v1.2.3', 'hello-v'],
  ])('returns null for %s with prefix "%s"', (tag, prefix) => {
    expect(parseTagVersion(tag, prefix)).toBeNull()
  })

  it('returns null for numbers beyond the safe integer range', () => {
    expect(parseTagVersion('1.2.99999999999999999999', '')).toBeNull()
  })
})
