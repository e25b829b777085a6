import { describe, expect, it } from 'vitest'

import { VERSION_FIELDS } from '../../core/format/version-fields'
import { sampleVersionInfo } from '../sample-version-info'
import { formatJson } from '../../core/format/format-json'

describe('formatJson', () => {
  it('renders every field in the fixed order on one line', () => {
    let output = formatJson(sampleVersionInfo, [...VERSION_FIELDS], false)

    expect(output.endsWith('}\n')).toBe(true)
    expect(output.split('\n')).toHaveLength(2)
    expect(output).toMatch(/^\{"major":0,"minor":5,"patch":0,"commits":1,/u)
    expect(Object.keys(JSON.parse(output))).toEqual(VERSION_FIELDS)
    expect(JSON.parse(output)).toEqual(sampleVersionInfo)
  })

  it('indents with four spaces when pretty', () => {
    let output = formatJson(sampleVersionInfo, ['semver', 'tag'], true)

    expect(output).toBe(
      '{\n    "semver": "0.5.0",\n    "tag": "myservice-v0.5.0"\n}\n',
    )
  })

  it('renders absent values as null', () => {
    let info = { ...sampleVersionInfo, last_hash: null, last_tag: null }

    expect(formatJson(info, ['last_tag', 'last_hash'], false)).toBe(
      '{"last_tag":null,"last_hash":null}\n',
    )
  })
})
