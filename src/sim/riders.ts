import { delay } from './clock'
import type { Sleep } from './clock'
import { describeError } from './errors'
import type { Logger } from './logger'
import type { CallResult, ElevatorSnapshot, Floor, TravelDirection } from './types'

export interface ElevatorClient {
  submitHallCall(floor: Floor, direction: TravelDirection): Promise<CallResult>
  submitCarCall(floor: Floor): Promise<CallResult>
  getState(): Promise<ElevatorSnapshot>
}

export interface RiderOptions {
  maxFloor: number
  pollIntervalMs: number
  waitTimeoutMs: number
  // Board or alight once the cab has been at the floor this long, even if not idle
  boardGraceMs: number
  minRestMs: number
  maxRestMs: number
  random: () => number
  now: () => number
  sleep: Sleep
}

export const DEFAULT_RIDER_OPTIONS: RiderOptions = {
  maxFloor: 20,
  pollIntervalMs: 2000,
  waitTimeoutMs: 60_000,
  boardGraceMs: 5000,
  minRestMs: 5000,
  maxRestMs: 20_000,
  random: Math.random,
  now: () => Date.now(),
  sleep: delay,
}

export interface RideRecord {
  rider: number
  from: Floor
  to: Floor
  waitMs: number
  rideMs: number
  delivered: boolean // false when the ride timed out
}

export interface RideSummary {
  completed: number
  abandoned: number
  avgWaitSec: number
  maxWaitSec: number
  avgRideSec: number
}

export class RideStats {
  private completed = 0
  private abandoned = 0
  private totalWait = 0
  private maxWait = 0
  private totalRide = 0

  record(ride: RideRecord) {
    this.completed++
    this.totalWait += ride.waitMs
    this.totalRide += ride.rideMs
    if (ride.waitMs > this.maxWait) this.maxWait = ride.waitMs
  }

  recordAbandoned() {
    this.abandoned++
  }

  summary(): RideSummary {
    const n = this.completed
    return {
      completed: n,
      abandoned: this.abandoned,
      avgWaitSec: n > 0 ? this.totalWait / n / 1000 : 0,
      maxWaitSec: this.maxWait / 1000,
      avgRideSec: n > 0 ? this.totalRide / n / 1000 : 0,
    }
  }
}

export function randomFloor(random: () => number, maxFloor: number, exclude?: Floor): Floor {
  let floor: Floor
  do {
    floor = 1 + Math.floor(random() * maxFloor)
  } while (floor === exclude)
  return floor
}

/** One simulated person: call, wait, board, ride, alight. */
export class Rider {
  readonly id: number
  floor: Floor
  private readonly client: ElevatorClient
  private readonly opts: RiderOptions
  private readonly logger: Logger

  constructor(id: number, client: ElevatorClient, opts: RiderOptions, logger: Logger) {
    this.id = id
    this.client = client
    this.opts = opts
    this.logger = logger
    this.floor = randomFloor(opts.random, opts.maxFloor)
  }

  /**
   * Returns null when the call failed, the rider gave up waiting or the
   * signal aborted. No call is placed once the signal has aborted.
   */
  async ride(signal?: AbortSignal): Promise<RideRecord | null> {
    const from = this.floor
    const to = randomFloor(this.opts.random, this.opts.maxFloor, from)
    const direction: TravelDirection = to > from ? 'up' : 'down'

    if (signal?.aborted) return null
    const called = await this.attempt(`hall call at ${from}`, () => this.client.submitHallCall(from, direction))
    if (called !== 'ok' && called !== 'alreadyThere') return null
    this.logger.info(`Rider ${this.id} at floor ${from} waiting to go ${direction}`)

    const waitStart = this.opts.now()
    if (!await this.awaitCab(from, signal)) {
      if (signal?.aborted) return null
      this.logger.warn(`Rider ${this.id} gave up waiting at floor ${from}`)
      return null
    }
    const boarded = this.opts.now()

    if (signal?.aborted) return null
    const sent = await this.attempt(`car call to ${to}`, () => this.client.submitCarCall(to))
    if (sent !== 'ok' && sent !== 'alreadyThere') return null
    this.logger.info(`Rider ${this.id} riding from ${from} to ${to}`)

    // A timed-out rider is assumed to have got there anyway
    const delivered = sent === 'alreadyThere' || await this.awaitCab(to, signal)
    this.floor = to
    if (signal?.aborted) return null
    if (!delivered) this.logger.warn(`Rider ${this.id} ride to ${to} timed out`)

    return {
      rider: this.id,
      from,
      to,
      waitMs: boarded - waitStart,
      rideMs: this.opts.now() - boarded,
      delivered,
    }
  }

  private async awaitCab(floor: Floor, signal?: AbortSignal): Promise<boolean> {
    const start = this.opts.now()
    while (!signal?.aborted && this.opts.now() - start < this.opts.waitTimeoutMs) {
      try {
        const cab = await this.client.getState()
        const elapsed = this.opts.now() - start
        if (cab.floor === floor && (cab.direction === 'idle' || elapsed > this.opts.boardGraceMs)) return true
      } catch (err) {
        this.logger.error(`Rider ${this.id} could not read elevator state: ${describeError(err)}`)
      }
      await this.opts.sleep(this.opts.pollIntervalMs, signal)
    }
    return false
  }

  private async attempt(what: string, run: () => Promise<CallResult>): Promise<CallResult | null> {
    try {
      const result = await run()
      if (result === 'invalidFloor') this.logger.error(`Rider ${this.id} ${what} rejected`)
      return result
    } catch (err) {
      this.logger.error(`Rider ${this.id} ${what} failed: ${describeError(err)}`)
      return null
    }
  }
}

export interface RunRidersOptions extends Partial<RiderOptions> {
  riders: number
  durationMs: number
  signal?: AbortSignal
  onRide?: (ride: RideRecord, stats: RideStats) => void
}

/** Runs riders concurrently until the duration elapses or the signal aborts. */
export async function runRiders(client: ElevatorClient, options: RunRidersOptions, logger: Logger): Promise<RideSummary> {
  const opts: RiderOptions = { ...DEFAULT_RIDER_OPTIONS, ...options }
  const { signal, onRide } = options
  const stats = new RideStats()
  const endAt = opts.now() + options.durationMs
  logger.info(`Starting ${options.riders} riders for ${options.durationMs} ms`)

  const loop = async (rider: Rider) => {
    while (opts.now() < endAt && !signal?.aborted) {
      const ride = await rider.ride(signal)
      if (ride) {
        stats.record(ride)
        onRide?.(ride, stats)
      } else if (!signal?.aborted) {
        stats.recordAbandoned()
      }
      const rest = opts.minRestMs + opts.random() * (opts.maxRestMs - opts.minRestMs)
      await opts.sleep(rest, signal)
    }
  }

  const riders = Array.from({ length: options.riders }, (_, i) => new Rider(i + 1, client, opts, logger))
  await Promise.all(riders.map(loop))
  logger.info('Riders finished')
  return stats.summary()
}
