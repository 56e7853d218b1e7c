export type Floor = number

export type Direction = 'up' | 'down' | 'idle'

// Direction a passenger travels; also names the call queue that holds it.
export type TravelDirection = Exclude<Direction, 'idle'>
export type QueueName = TravelDirection

export interface ElevatorSnapshot {
  floor: Floor
  direction: Direction
}

export type CallResult = 'ok' | 'alreadyThere' | 'invalidFloor'

export interface QueueContents {
  up: Floor[]
  down: Floor[]
}

export interface RunStatus {
  running: boolean
}

/**
 * Persistence boundary for the dispatcher. Every method is atomic on its own;
 * nothing groups two calls together, so peek-then-remove and read-modify-write
 * sequences are only safe while a single scheduler owns them.
 *
 * Reads return raw values: shape checks happen in the core.
 */
export interface StateStore {
  getState(): Promise<unknown>
  setState(floor: Floor, direction: Direction): Promise<void>

  queueAdd(queue: QueueName, floor: Floor): Promise<void>
  /** `up`: smallest member >= fromFloor. `down`: largest member <= fromFloor. */
  queuePeekNearest(queue: QueueName, fromFloor: Floor, direction: TravelDirection): Promise<Floor | null>
  queueRemove(queue: QueueName, floor: Floor): Promise<void>
  queueMembers(queue: QueueName): Promise<Floor[]>

  intendedDirectionGet(floor: Floor): Promise<unknown>
  intendedDirectionSet(floor: Floor, direction: TravelDirection): Promise<void>
  intendedDirectionClear(floor: Floor): Promise<void>
}

export interface TargetSelection {
  floor: Floor
  direction: TravelDirection
  queue: QueueName
}

export interface TargetCandidates {
  up: Floor | null
  down: Floor | null
}

export type TickOutcome = 'served' | 'settled' | 'waiting'
