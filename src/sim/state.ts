import { StateCorruptionError, ValidationError, storeCall } from './errors'
import type { Logger } from './logger'
import type { Direction, ElevatorSnapshot, Floor, StateStore, TravelDirection } from './types'

export const DEFAULT_SNAPSHOT: Readonly<ElevatorSnapshot> = { floor: 1, direction: 'idle' }

const DIRECTIONS: readonly string[] = ['up', 'down', 'idle']

export function isDirection(value: unknown): value is Direction {
  return typeof value === 'string' && DIRECTIONS.includes(value)
}

export function isTravelDirection(value: unknown): value is TravelDirection {
  return value === 'up' || value === 'down'
}

export function isValidFloor(value: unknown, maxFloor: number): value is Floor {
  return typeof value === 'number' && Number.isInteger(value) && value >= 1 && value <= maxFloor
}

export function assertFloor(value: unknown, maxFloor: number): asserts value is Floor {
  if (!isValidFloor(value, maxFloor)) {
    throw new ValidationError(`Floor must be an integer between 1 and ${maxFloor}`, value)
  }
}

export function parseTravelDirection(value: string): TravelDirection {
  const normalized = value.trim().toLowerCase()
  if (!isTravelDirection(normalized)) {
    throw new ValidationError(`Direction must be "up" or "down", got "${value}"`, value)
  }
  return normalized
}

// Key/value stores hand numbers back as decimal strings; both forms are accepted.
function toFloor(raw: unknown): number | null {
  if (typeof raw === 'number') return raw
  if (typeof raw === 'string' && /^\d+$/.test(raw)) return Number(raw)
  return null
}

export function parseSnapshot(raw: unknown, maxFloor: number): ElevatorSnapshot {
  if (typeof raw !== 'object' || raw === null) {
    throw new StateCorruptionError('Elevator state is not a record', raw)
  }
  const floor = 'floor' in raw ? toFloor(raw.floor) : null
  if (!isValidFloor(floor, maxFloor)) {
    throw new StateCorruptionError('Elevator state has no valid floor', raw)
  }
  const direction = 'direction' in raw ? raw.direction : undefined
  if (!isDirection(direction)) {
    throw new StateCorruptionError('Elevator state has no valid direction', raw)
  }
  return { floor, direction }
}

function describeStored(raw: unknown): string {
  try {
    return JSON.stringify(raw)
  } catch {
    // BigInt members and cycles
    return Object.prototype.toString.call(raw)
  }
}

/** The single shared `{floor, direction}` record, created lazily with defaults. */
export class ElevatorState {
  private readonly store: StateStore
  private readonly maxFloor: number
  private readonly logger: Logger

  constructor(store: StateStore, maxFloor: number, logger: Logger) {
    this.store = store
    this.maxFloor = maxFloor
    this.logger = logger
  }

  async get(): Promise<ElevatorSnapshot> {
    const raw = await storeCall('getState', () => this.store.getState())
    if (raw === null || raw === undefined) {
      this.logger.info(`No elevator state yet, starting at floor ${DEFAULT_SNAPSHOT.floor}`)
      return this.reset()
    }
    try {
      return parseSnapshot(raw, this.maxFloor)
    } catch (err) {
      if (!(err instanceof StateCorruptionError)) throw err
      this.logger.warn(`${err.message}, resetting to defaults`, { stored: describeStored(raw) })
      return this.reset()
    }
  }

  set(floor: Floor, direction: Direction): Promise<void> {
    return storeCall('setState', () => this.store.setState(floor, direction))
  }

  private async reset(): Promise<ElevatorSnapshot> {
    await this.set(DEFAULT_SNAPSHOT.floor, DEFAULT_SNAPSHOT.direction)
    return { ...DEFAULT_SNAPSHOT }
  }
}
