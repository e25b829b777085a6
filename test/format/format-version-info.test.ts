import { describe, expect, it } from 'vitest'

import { formatVersionInfo } from '../../core/format/format-version-info'
import { VERSION_FIELDS } from '../../core/format/version-fields'
import { FormatError } from '../../core/errors/format-error'
import { sampleVersionInfo } from '../sample-version-info'

/**
 * Split a CSV line produced for the sample, which needs no quoting.
 *
 * @param line - CSV line.
 * @returns Cells.
 */
function cells(line: undefined | string): string[] {
  return (line ?? '').split(',')
}

describe('formatVersionInfo', () => {
  it('uses VERSION_ as the default env prefix', () => {
    expect(
      formatVersionInfo(sampleVersionInfo, { fields: ['tag'], format: 'env' }),
    ).toBe('VERSION_TAG="myservice-v0.5.0"\n')
  })

  it('renders the selected fields in the fixed order', () => {
    expect(
      formatVersionInfo(sampleVersionInfo, {
        fields: ['timestamp', 'semver', 'major', 'semver'],
        csvHeader: true,
        format: 'csv',
      }),
    ).toBe('major,semver,timestamp\n0,0.5.0,20240502T101530Z\n')
  })

  it('renders the same values in the same order across formats', () => {
    let json: Record<string, unknown> = JSON.parse(
      formatVersionInfo(sampleVersionInfo, { format: 'json' }),
    )
    let env = formatVersionInfo(sampleVersionInfo, {
      envPrefix: '',
      format: 'env',
    })
      .trimEnd()
      .split('\n')
    let [header, row] = formatVersionInfo(sampleVersionInfo, {
      csvHeader: true,
      format: 'csv',
    })
      .trimEnd()
      .split('\n')

    expect(cells(header)).toEqual(Object.keys(json))
    expect(cells(header)).toEqual(VERSION_FIELDS)
    expect(cells(row)).toEqual(Object.values(json).map(String))
    expect(env.map(line => line.slice(0, line.indexOf('=')))).toEqual(
      VERSION_FIELDS.map(field => field.toUpperCase()),
    )
    expect(
      env.map(line => line.slice(line.indexOf('=') + 1).replaceAll('"', '')),
    ).toEqual(cells(row))
  })

  it('throws FormatError for an unknown format', () => {
    expect(() =>
      formatVersionInfo(sampleVersionInfo, { format: 'yaml' as never }),
    ).toThrowError('Invalid format "yaml". Expected "json", "env", or "csv".')
    expect(() =>
      formatVersionInfo(sampleVersionInfo, { format: 'yaml' as never }),
    ).toThrowError(FormatError)
  })
})
