import { describe, expect, it, vi } from 'vitest'
import type { Sleep } from './clock'
import { ConfigError, TransientStoreError } from './errors'
import { ElevatorController } from './controller'
import { createLogger, createMemorySink } from './logger'
import { MemoryStateStore } from './store'
import type { MemoryStoreSeed } from './store'

function setup(seed: MemoryStoreSeed = {}) {
  const store = new MemoryStateStore(seed)
  const { sink, entries } = createMemorySink()
  const controller = new ElevatorController({
    store,
    logger: createLogger('Dispatch', 'info', sink),
    config: { floorTravelMs: 0, doorDwellMs: 0, settleWaitMs: 0, tickIntervalMs: 0 },
  })
  return { store, controller, entries }
}

describe('ElevatorController admission', () => {
  it('reports alreadyThere for a car call to the current floor', async () => {
    const { controller } = setup({ state: { floor: 5, direction: 'idle' } })

    expect(await controller.submitCarCall(5)).toBe('alreadyThere')
    expect(await controller.getQueues()).toEqual({ up: [], down: [] })
  })

  it('reports alreadyThere for a hall call at the current floor without registering a direction', async () => {
    const { store, controller } = setup()

    expect(await controller.submitHallCall(1, 'up')).toBe('alreadyThere')
    expect(await store.intendedDirectionGet(1)).toBeNull()
  })

  it('places every other floor in exactly one queue', async () => {
    const { controller } = setup({ state: { floor: 5, direction: 'idle' } })

    for (let f = 1; f <= 20; f++) {
      if (f !== 5) expect(await controller.submitCarCall(f)).toBe('ok')
    }

    const { up, down } = await controller.getQueues()
    expect(down).toEqual([1, 2, 3, 4])
    expect(up).toEqual([6, 7, 8, 9, 10, 11, 12, 13, 14, 15, 16, 17, 18, 19, 20])
  })

  it('registers the intended direction for hall calls only', async () => {
    const { store, controller } = setup({ state: { floor: 10, direction: 'idle' } })

    await controller.submitHallCall(4, 'up')
    await controller.submitCarCall(14)

    expect(await controller.getQueues()).toEqual({ up: [14], down: [4] })
    expect(await store.intendedDirectionGet(4)).toBe('up')
    expect(await store.intendedDirectionGet(14)).toBeNull()
  })

  it.each([0, -3, 21, 2.5, Number.NaN])('rejects floor %s', async (floor) => {
    const { controller, entries } = setup()

    expect(await controller.submitCarCall(floor)).toBe('invalidFloor')
    expect(await controller.submitHallCall(floor, 'down')).toBe('invalidFloor')
    expect(await controller.getQueues()).toEqual({ up: [], down: [] })
    expect(entries.filter(e => e.level === 'warn')).toHaveLength(2)
  })

  it('passes store failures to the caller', async () => {
    const { store, controller } = setup()
    vi.spyOn(store, 'queueAdd').mockRejectedValueOnce(new Error('disk full'))

    await expect(controller.submitCarCall(7)).rejects.toThrow(TransientStoreError)
    expect(await controller.submitCarCall(7)).toBe('ok')
  })
})

describe('ElevatorController queries', () => {
  it('reports the floor and the full state', async () => {
    const { controller } = setup({ state: { floor: '12', direction: 'down' } })

    expect(await controller.getFloor()).toBe(12)
    expect(await controller.getState()).toEqual({ floor: 12, direction: 'down' })
  })

  it('rejects an invalid configuration up front', () => {
    expect(() => new ElevatorController({ config: { maxFloor: 1 } })).toThrow(ConfigError)
  })
})

describe('ElevatorController loop control', () => {
  it('runs one loop at a time', async () => {
    const { controller } = setup()

    expect(controller.status()).toEqual({ running: false })
    expect(controller.start()).toBe(true)
    expect(controller.start()).toBe(false)
    expect(controller.status()).toEqual({ running: true })

    await controller.stop()
    expect(controller.status()).toEqual({ running: false })
  })

  it('finishes the trip in progress before stopping', async () => {
    const { controller } = setup()

    expect(await controller.submitCarCall(4)).toBe('ok')
    controller.start()
    await controller.stop()

    expect(await controller.getState()).toEqual({ floor: 4, direction: 'up' })
    expect(await controller.getQueues()).toEqual({ up: [], down: [] })
  })

  it('can be restarted and serves calls admitted while stopped', async () => {
    const { controller } = setup({ state: { floor: 9, direction: 'idle' } })

    controller.start()
    await controller.stop()
    expect(await controller.getState()).toEqual({ floor: 9, direction: 'idle' })

    await controller.submitHallCall(2, 'up')
    controller.start()
    await controller.stop()
    expect(await controller.getState()).toEqual({ floor: 2, direction: 'up' })
  })

  it('settles again after serving a call admitted while idle, and only then', async () => {
    const store = new MemoryStateStore({ state: { floor: 3, direction: 'idle' } })
    const setState = vi.spyOn(store, 'setState')
    const sleep = vi.fn<Sleep>(() => new Promise<void>(resolve => setTimeout(resolve, 1)))
    const controller = new ElevatorController({ store, sleep, logger: createLogger('Dispatch', 'error', () => {}) })
    const idleWrites = () => setState.mock.calls.filter(([, direction]) => direction === 'idle').map(([floor]) => floor)

    controller.start()
    await vi.waitFor(() => expect(idleWrites()).toEqual([3]))

    expect(await controller.submitCarCall(7)).toBe('ok')
    await vi.waitFor(() => expect(idleWrites()).toEqual([3, 7]))

    expect(await controller.submitCarCall(7)).toBe('alreadyThere')
    expect(await controller.submitHallCall(7, 'down')).toBe('alreadyThere')
    expect(await controller.submitCarCall(0)).toBe('invalidFloor')
    const slept = sleep.mock.calls.length
    await vi.waitFor(() => expect(sleep.mock.calls.length).toBeGreaterThan(slept + 5))
    await controller.stop()

    expect(idleWrites()).toEqual([3, 7])
    expect(await controller.getState()).toEqual({ floor: 7, direction: 'idle' })
  })

  it('ignores stop when not running', async () => {
    const { controller } = setup()
    await expect(controller.stop()).resolves.toBeUndefined()
  })
})
