import { delay } from './clock'
import type { Sleep } from './clock'
import { resolveConfig } from './config'
import type { DispatchConfig } from './config'
import { ValidationError } from './errors'
import { IntendedDirectionRegistry } from './intent'
import { createLogger } from './logger'
import type { Logger } from './logger'
import { CallQueue } from './queue'
import { DispatchScheduler } from './scheduler'
import { ElevatorState, assertFloor } from './state'
import { MemoryStateStore } from './store'
import type {
  CallResult,
  ElevatorSnapshot,
  Floor,
  QueueContents,
  QueueName,
  RunStatus,
  StateStore,
  TravelDirection,
} from './types'

export interface ControllerOptions {
  store?: StateStore
  config?: Partial<DispatchConfig>
  logger?: Logger
  sleep?: Sleep
}

interface ActiveLoop {
  scheduler: DispatchScheduler
  abort: AbortController
  done: Promise<void>
}

/**
 * Caller-facing API: call admission, read-only state queries and control of
 * the single dispatch loop. Safe to call from any number of concurrent callers.
 */
export class ElevatorController {
  readonly config: DispatchConfig
  private readonly store: StateStore
  private readonly logger: Logger
  private readonly sleep: Sleep
  private readonly state: ElevatorState
  private readonly queues: Record<QueueName, CallQueue>
  private readonly intents: IntendedDirectionRegistry
  private readonly admission: Logger

  private loop: ActiveLoop | null = null

  constructor(options: ControllerOptions = {}) {
    this.config = resolveConfig(options.config)
    this.store = options.store ?? new MemoryStateStore()
    this.logger = options.logger ?? createLogger('Dispatch', this.config.logLevel)
    this.sleep = options.sleep ?? delay
    this.admission = this.logger.child('Admission')

    this.state = new ElevatorState(this.store, this.config.maxFloor, this.logger.child('State'))
    this.queues = {
      up: new CallQueue('up', this.store),
      down: new CallQueue('down', this.store),
    }
    this.intents = new IntendedDirectionRegistry(this.store, this.logger.child('Registry'))
  }

  /** External call from a floor; the direction is applied when the cab arrives. */
  submitHallCall(floor: Floor, direction: TravelDirection): Promise<CallResult> {
    return this.admit(floor, direction)
  }

  /** Destination pressed inside the cab. */
  submitCarCall(floor: Floor): Promise<CallResult> {
    return this.admit(floor, null)
  }

  getState(): Promise<ElevatorSnapshot> {
    return this.state.get()
  }

  async getFloor(): Promise<Floor> {
    const { floor } = await this.state.get()
    return floor
  }

  async getQueues(): Promise<QueueContents> {
    const [up, down] = await Promise.all([this.queues.up.members(), this.queues.down.members()])
    return { up, down }
  }

  start(): boolean {
    if (this.loop) return false

    const abort = new AbortController()
    const scheduler = new DispatchScheduler({
      state: this.state,
      queues: this.queues,
      intents: this.intents,
      config: this.config,
      logger: this.logger,
      signal: abort.signal,
      sleep: this.sleep,
    })
    const done = scheduler.run().finally(() => {
      if (this.loop?.scheduler === scheduler) this.loop = null
    })
    this.loop = { scheduler, abort, done }
    return true
  }

  /** Resolves once the tick in progress, if any, has finished. */
  async stop(): Promise<void> {
    const loop = this.loop
    if (!loop) return
    loop.abort.abort()
    await loop.done
  }

  status(): RunStatus {
    return { running: this.loop !== null }
  }

  private async admit(floor: Floor, direction: TravelDirection | null): Promise<CallResult> {
    const kind = direction ? 'Hall' : 'Car'
    try {
      assertFloor(floor, this.config.maxFloor)
    } catch (err) {
      if (!(err instanceof ValidationError)) throw err
      this.admission.warn(`${kind} call rejected: ${err.message}`, { floor })
      return 'invalidFloor'
    }

    // Classified against the floor seen now; the cab may move before the
    // scheduler reads the queue (the scheduler reclassifies stranded calls).
    const { floor: current } = await this.state.get()
    if (floor === current) {
      this.admission.info(`${kind} call for floor ${floor}: already there`)
      return 'alreadyThere'
    }

    const queue = floor > current ? this.queues.up : this.queues.down
    await queue.add(floor)
    if (direction) await this.intents.set(floor, direction)
    this.loop?.scheduler.markPending()

    this.admission.info(
      direction
        ? `Hall call at floor ${floor} going ${direction} (cab at ${current})`
        : `Car call to floor ${floor} (cab at ${current})`,
      { queue: queue.name },
    )
    if (this.admission.isEnabled('debug')) {
      const queues = await this.getQueues()
      this.admission.debug('Queues after admission', { up: queues.up.join(','), down: queues.down.join(',') })
    }
    return 'ok'
  }
}
