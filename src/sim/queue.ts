import { storeCall } from './errors'
import type { Floor, QueueName, StateStore, TravelDirection } from './types'

/**
 * Pending floors for one travel direction. Selection is directional: the up
 * queue answers with the nearest member at or above a floor, the down queue
 * with the nearest at or below it.
 */
export class CallQueue {
  readonly name: QueueName
  private readonly store: StateStore

  constructor(name: QueueName, store: StateStore) {
    this.name = name
    this.store = store
  }

  add(floor: Floor): Promise<void> {
    return storeCall(`queueAdd:${this.name}`, () => this.store.queueAdd(this.name, floor))
  }

  peekNearest(fromFloor: Floor, direction: TravelDirection = this.name): Promise<Floor | null> {
    return storeCall(`queuePeekNearest:${this.name}`, () => this.store.queuePeekNearest(this.name, fromFloor, direction))
  }

  remove(floor: Floor): Promise<void> {
    return storeCall(`queueRemove:${this.name}`, () => this.store.queueRemove(this.name, floor))
  }

  members(): Promise<Floor[]> {
    return storeCall(`queueMembers:${this.name}`, () => this.store.queueMembers(this.name))
  }
}
