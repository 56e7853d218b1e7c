import { storeCall } from './errors'
import type { Logger } from './logger'
import { isTravelDirection } from './state'
import type { Floor, StateStore, TravelDirection } from './types'

/**
 * Direction a hall-call passenger wants to travel after boarding, per floor.
 * Applied once when the cab arrives there; never used to pick targets.
 */
export class IntendedDirectionRegistry {
  private readonly store: StateStore
  private readonly logger: Logger

  constructor(store: StateStore, logger: Logger) {
    this.store = store
    this.logger = logger
  }

  set(floor: Floor, direction: TravelDirection): Promise<void> {
    return storeCall('intendedDirectionSet', () => this.store.intendedDirectionSet(floor, direction))
  }

  async get(floor: Floor): Promise<TravelDirection | null> {
    const raw = await storeCall('intendedDirectionGet', () => this.store.intendedDirectionGet(floor))
    if (raw === null || raw === undefined) return null
    if (isTravelDirection(raw)) return raw
    this.logger.warn(`Discarding unreadable intended direction for floor ${floor}`, { stored: String(raw) })
    await this.clear(floor)
    return null
  }

  clear(floor: Floor): Promise<void> {
    return storeCall('intendedDirectionClear', () => this.store.intendedDirectionClear(floor))
  }
}
