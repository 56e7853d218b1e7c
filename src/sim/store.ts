import type { Direction, Floor, QueueName, StateStore, TravelDirection } from './types'

export interface MemoryStoreSeed {
  state?: unknown
  queues?: Partial<Record<QueueName, Floor[]>>
  intents?: Record<Floor, unknown>
}

/**
 * In-process StateStore with sorted-set queues. Values are kept as given, so a
 * seed can hold a record of the wrong shape the way a long-lived external
 * store might after a schema change.
 */
export class MemoryStateStore implements StateStore {
  private state: unknown = null
  private readonly queues: Record<QueueName, Floor[]> = { up: [], down: [] }
  private readonly intents = new Map<Floor, unknown>()

  constructor(seed: MemoryStoreSeed = {}) {
    if (seed.state !== undefined) this.state = seed.state
    for (const [name, floors] of Object.entries(seed.queues ?? {})) {
      for (const floor of floors ?? []) insertSorted(this.queueFor(name), floor)
    }
    for (const [floor, value] of Object.entries(seed.intents ?? {})) {
      this.intents.set(Number(floor), value)
    }
  }

  async getState(): Promise<unknown> {
    return this.state
  }

  async setState(floor: Floor, direction: Direction): Promise<void> {
    this.state = { floor, direction }
  }

  async queueAdd(queue: QueueName, floor: Floor): Promise<void> {
    insertSorted(this.queues[queue], floor)
  }

  async queuePeekNearest(queue: QueueName, fromFloor: Floor, direction: TravelDirection): Promise<Floor | null> {
    const members = this.queues[queue]
    if (direction === 'up') {
      return members.find(f => f >= fromFloor) ?? null
    }
    for (let i = members.length - 1; i >= 0; i--) {
      if (members[i] <= fromFloor) return members[i]
    }
    return null
  }

  async queueRemove(queue: QueueName, floor: Floor): Promise<void> {
    const members = this.queues[queue]
    const idx = members.indexOf(floor)
    if (idx >= 0) members.splice(idx, 1)
  }

  async queueMembers(queue: QueueName): Promise<Floor[]> {
    return [...this.queues[queue]]
  }

  async intendedDirectionGet(floor: Floor): Promise<unknown> {
    return this.intents.get(floor) ?? null
  }

  async intendedDirectionSet(floor: Floor, direction: TravelDirection): Promise<void> {
    this.intents.set(floor, direction)
  }

  async intendedDirectionClear(floor: Floor): Promise<void> {
    this.intents.delete(floor)
  }

  private queueFor(name: string): Floor[] {
    if (name === 'up' || name === 'down') return this.queues[name]
    throw new Error(`Unknown queue ${name}`)
  }
}

function insertSorted(members: Floor[], floor: Floor) {
  let lo = 0
  let hi = members.length
  while (lo < hi) {
    const mid = (lo + hi) >> 1
    if (members[mid] < floor) lo = mid + 1
    else hi = mid
  }
  if (members[lo] !== floor) members.splice(lo, 0, floor)
}
