import { describe, expect, it } from 'vitest'
import { DEFAULT_CONFIG, parseConfigParams, resolveConfig } from './config'
import { ConfigError } from './errors'

describe('resolveConfig', () => {
  it('fills in defaults', () => {
    expect(resolveConfig()).toEqual(DEFAULT_CONFIG)
    expect(resolveConfig({ maxFloor: 35 })).toEqual({ ...DEFAULT_CONFIG, maxFloor: 35 })
  })

  it('rejects a building with fewer than two floors', () => {
    expect(() => resolveConfig({ maxFloor: 1 })).toThrow('Invalid config maxFloor: expected an integer >= 2, got 1')
  })

  it('rejects negative durations', () => {
    expect(() => resolveConfig({ doorDwellMs: -5 })).toThrow(ConfigError)
  })
})

describe('parseConfigParams', () => {
  it('reads known keys from a query string', () => {
    const params = new URLSearchParams('maxFloor=30&floorTravelMs=250&reclassifyStranded=false&logLevel=debug&theme=dark')
    expect(parseConfigParams(params)).toEqual({
      maxFloor: 30,
      floorTravelMs: 250,
      reclassifyStranded: false,
      logLevel: 'debug',
    })
  })

  it('returns no overrides for an empty query', () => {
    expect(parseConfigParams(new URLSearchParams(''))).toEqual({})
  })

  it.each([
    ['maxFloor=abc', 'maxFloor'],
    ['tickIntervalMs=', 'tickIntervalMs'],
    ['reclassifyStranded=yes', 'reclassifyStranded'],
    ['logLevel=loud', 'logLevel'],
  ])('rejects %s', (query, key) => {
    let thrown: unknown
    try {
      parseConfigParams(new URLSearchParams(query))
    } catch (err) {
      thrown = err
    }
    expect(thrown).toBeInstanceOf(ConfigError)
    expect(thrown).toMatchObject({ key })
  })
})
