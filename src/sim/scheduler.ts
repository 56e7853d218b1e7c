import type { DispatchConfig } from './config'
import { delay } from './clock'
import type { Sleep } from './clock'
import { describeError } from './errors'
import type { IntendedDirectionRegistry } from './intent'
import type { Logger } from './logger'
import type { CallQueue } from './queue'
import type { ElevatorState } from './state'
import type {
  ElevatorSnapshot,
  Floor,
  QueueName,
  TargetCandidates,
  TargetSelection,
  TickOutcome,
} from './types'

/**
 * SCAN target selection. While moving, keep going the same way if anything is
 * queued ahead, else turn around. From idle take the nearer candidate; equal
 * distances go up.
 */
export function chooseTarget(current: ElevatorSnapshot, candidates: TargetCandidates): TargetSelection | null {
  const up = candidates.up === null ? null : { floor: candidates.up, direction: 'up', queue: 'up' } as const
  const down = candidates.down === null ? null : { floor: candidates.down, direction: 'down', queue: 'down' } as const

  switch (current.direction) {
    case 'up':
      return up ?? down
    case 'down':
      return down ?? up
    case 'idle':
      if (up && down) {
        return Math.abs(up.floor - current.floor) <= Math.abs(down.floor - current.floor) ? up : down
      }
      return up ?? down
  }
}

export interface SchedulerDeps {
  state: ElevatorState
  queues: Record<QueueName, CallQueue>
  intents: IntendedDirectionRegistry
  config: DispatchConfig
  logger: Logger
  signal: AbortSignal
  sleep?: Sleep
}

export class DispatchScheduler {
  private readonly state: ElevatorState
  private readonly queues: Record<QueueName, CallQueue>
  private readonly intents: IntendedDirectionRegistry
  private readonly config: DispatchConfig
  private readonly logger: Logger
  private readonly signal: AbortSignal
  private readonly sleep: Sleep

  // True once the idle transition for the current empty spell has been written
  private settled = false

  constructor(deps: SchedulerDeps) {
    this.state = deps.state
    this.queues = deps.queues
    this.intents = deps.intents
    this.config = deps.config
    this.logger = deps.logger
    this.signal = deps.signal
    this.sleep = deps.sleep ?? delay
  }

  get isSettled() {
    return this.settled
  }

  /** Called after every admitted call so the next empty spell settles again. */
  markPending() {
    this.settled = false
  }

  async run(): Promise<void> {
    this.logger.info('Dispatch loop started')
    while (!this.signal.aborted) {
      try {
        await this.tick()
      } catch (err) {
        this.logger.error(`Tick failed, retrying next tick: ${describeError(err)}`)
      }
      if (this.signal.aborted) break
      await this.sleep(this.config.tickIntervalMs, this.signal)
    }
    this.logger.info('Dispatch loop stopped')
  }

  async tick(): Promise<TickOutcome> {
    const current = await this.state.get()

    let target = chooseTarget(current, await this.candidates(current.floor))
    if (!target && this.config.reclassifyStranded && await this.reclassifyStranded(current.floor)) {
      target = chooseTarget(current, await this.candidates(current.floor))
    }

    if (!target) return this.settle(current)

    this.settled = false
    await this.queues[target.queue].remove(target.floor)
    await this.travel(current.floor, target)
    await this.arrive(target)
    return 'served'
  }

  private async candidates(floor: Floor): Promise<TargetCandidates> {
    const [up, down] = await Promise.all([
      this.queues.up.peekNearest(floor),
      this.queues.down.peekNearest(floor),
    ])
    return { up, down }
  }

  // Admission classifies against the floor it saw; the cab may have moved past
  // since, leaving entries that directional peeks can no longer reach.
  private async reclassifyStranded(floor: Floor): Promise<boolean> {
    const [up, down] = await Promise.all([this.queues.up.members(), this.queues.down.members()])
    const strandedUp = up.filter(f => f < floor)
    const strandedDown = down.filter(f => f > floor)

    for (const f of strandedUp) {
      await this.queues.down.add(f)
      await this.queues.up.remove(f)
    }
    for (const f of strandedDown) {
      await this.queues.up.add(f)
      await this.queues.down.remove(f)
    }

    const moved = strandedUp.length + strandedDown.length
    if (moved > 0) {
      this.logger.warn(`Reclassified ${moved} stranded call(s)`, {
        toDown: strandedUp.join(','),
        toUp: strandedDown.join(','),
      })
    }
    return moved > 0
  }

  private async travel(from: Floor, target: TargetSelection) {
    const step = target.direction === 'up' ? 1 : -1
    this.logger.info(`Moving ${target.direction} from floor ${from} to ${target.floor}`)

    let floor = from
    while (floor !== target.floor) {
      await this.sleep(this.config.floorTravelMs)
      floor += step
      await this.state.set(floor, target.direction)
      this.logger.debug(`Passing floor ${floor}`)
    }
    if (from === target.floor) {
      await this.state.set(floor, target.direction)
    }
  }

  private async arrive(target: TargetSelection) {
    this.logger.info(`Reached floor ${target.floor}`)

    const intended = await this.intents.get(target.floor)
    if (intended) {
      await this.intents.clear(target.floor)
      if (intended !== target.direction) {
        await this.state.set(target.floor, intended)
      }
      this.logger.info(`Intended direction at floor ${target.floor}: ${intended}`)
    }

    this.logger.debug('Opening doors')
    await this.sleep(this.config.doorDwellMs)
    this.logger.debug('Closing doors')
  }

  private async settle(current: ElevatorSnapshot): Promise<TickOutcome> {
    if (this.settled) {
      await this.sleep(this.config.settleWaitMs, this.signal)
      return 'waiting'
    }
    await this.state.set(current.floor, 'idle')
    this.settled = true
    this.logger.info(`No pending calls, idle at floor ${current.floor}`)
    return 'settled'
  }
}
