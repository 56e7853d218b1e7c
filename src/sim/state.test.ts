import { describe, expect, it } from 'vitest'
import { StateCorruptionError, ValidationError } from './errors'
import { IntendedDirectionRegistry } from './intent'
import { createLogger, createMemorySink } from './logger'
import { ElevatorState, assertFloor, parseSnapshot, parseTravelDirection } from './state'
import { MemoryStateStore } from './store'

function setup(seed: ConstructorParameters<typeof MemoryStateStore>[0] = {}) {
  const store = new MemoryStateStore(seed)
  const { sink, entries } = createMemorySink()
  const logger = createLogger('State', 'debug', sink)
  return { store, entries, state: new ElevatorState(store, 20, logger), intents: new IntendedDirectionRegistry(store, logger) }
}

describe('parseSnapshot', () => {
  it('accepts numeric and decimal-string floors', () => {
    expect(parseSnapshot({ floor: 7, direction: 'down' }, 20)).toEqual({ floor: 7, direction: 'down' })
    expect(parseSnapshot({ floor: '12', direction: 'idle' }, 20)).toEqual({ floor: 12, direction: 'idle' })
  })

  it.each([
    ['a string', 'floor=3'],
    ['an array', [3, 'up']],
    ['a missing floor', { direction: 'up' }],
    ['a fractional floor', { floor: 2.5, direction: 'up' }],
    ['a floor above the top', { floor: 21, direction: 'up' }],
    ['floor zero', { floor: 0, direction: 'up' }],
    ['an unknown direction', { floor: 3, direction: 'sideways' }],
  ])('rejects %s', (_label, raw) => {
    expect(() => parseSnapshot(raw, 20)).toThrow(StateCorruptionError)
  })
})

describe('ElevatorState', () => {
  it('creates the default record on first read', async () => {
    const { store, state } = setup()
    expect(await state.get()).toEqual({ floor: 1, direction: 'idle' })
    expect(await store.getState()).toEqual({ floor: 1, direction: 'idle' })
  })

  it('returns what was last written', async () => {
    const { state } = setup()
    await state.set(9, 'up')
    expect(await state.get()).toEqual({ floor: 9, direction: 'up' })
  })

  it('resets a corrupted record to defaults and warns', async () => {
    const { store, state, entries } = setup({ state: { floor: 40, direction: 'up' } })

    expect(await state.get()).toEqual({ floor: 1, direction: 'idle' })
    expect(await store.getState()).toEqual({ floor: 1, direction: 'idle' })
    expect(entries.filter(e => e.level === 'warn').map(e => e.message)).toEqual([
      'Elevator state has no valid floor, resetting to defaults',
    ])
  })

  it('recovers from a stored value that cannot be serialised', async () => {
    const looped: Record<string, unknown> = { direction: 'up' }
    looped.self = looped
    const { state, entries } = setup({ state: looped })

    expect(await state.get()).toEqual({ floor: 1, direction: 'idle' })
    expect(entries.filter(e => e.level === 'warn')).toEqual([{
      level: 'warn',
      scope: 'State',
      message: 'Elevator state has no valid floor, resetting to defaults',
      details: { stored: '[object Object]' },
    }])
  })

  it('recovers from a BigInt floor', async () => {
    const { state, entries } = setup({ state: { floor: 5n, direction: 'up' } })

    expect(await state.get()).toEqual({ floor: 1, direction: 'idle' })
    expect(entries.filter(e => e.level === 'warn').map(e => e.details)).toEqual([{ stored: '[object Object]' }])
  })
})

describe('IntendedDirectionRegistry', () => {
  it('sets, reads and clears an entry', async () => {
    const { intents } = setup()
    await intents.set(6, 'down')
    expect(await intents.get(6)).toBe('down')
    await intents.clear(6)
    expect(await intents.get(6)).toBeNull()
  })

  it('drops an unreadable entry', async () => {
    const { store, intents, entries } = setup({ intents: { 4: 'sideways' } })

    expect(await intents.get(4)).toBeNull()
    expect(await store.intendedDirectionGet(4)).toBeNull()
    expect(entries.map(e => e.message)).toEqual(['Discarding unreadable intended direction for floor 4'])
  })
})

describe('input validation', () => {
  it('rejects floors outside the building', () => {
    expect(() => assertFloor(0, 20)).toThrow(ValidationError)
    expect(() => assertFloor(21, 20)).toThrow('Floor must be an integer between 1 and 20')
    expect(() => assertFloor(20, 20)).not.toThrow()
  })

  it('parses travel directions leniently', () => {
    expect(parseTravelDirection(' Up ')).toBe('up')
    expect(parseTravelDirection('down')).toBe('down')
    expect(() => parseTravelDirection('idle')).toThrow(ValidationError)
  })
})
