import Phaser from 'phaser'
import type { DispatchConfig } from '../sim/config'
import { ElevatorController } from '../sim/controller'
import { describeError } from '../sim/errors'
import type { Logger } from '../sim/logger'
import { runRiders } from '../sim/riders'
import type { RideSummary } from '../sim/riders'
import type { CallResult, ElevatorSnapshot, QueueContents, TravelDirection } from '../sim/types'

export interface ViewerSnapshot {
  state: ElevatorSnapshot
  queues: QueueContents
  running: boolean
}

export interface HallCallRequest { floor: number; direction: TravelDirection }
export interface CarCallRequest { floor: number }
export interface RidersRequest { count: number; durationMs: number }
export interface CallReport { kind: 'hall' | 'car'; floor: number; result: CallResult | 'error' }

// Observers poll; the controller pushes nothing
const POLL_INTERVAL_MS = 100

export class ElevatorScene extends Phaser.Scene {
  static KEY = 'ElevatorScene'

  private gfx!: Phaser.GameObjects.Graphics
  private floorLabels: Phaser.GameObjects.Text[] = []
  private readonly baseConfig: DispatchConfig
  private readonly logger: Logger
  private config: DispatchConfig
  private controller: ElevatorController
  private riders: AbortController | null = null

  private snapshot: ViewerSnapshot | null = null
  private displayFloor = 1
  private lastPoll = 0
  private polling = false

  // drawing config
  private floorHeight = 36
  private readonly topMargin = 30
  private readonly shaftWidth = 56

  constructor(config: DispatchConfig, logger: Logger) {
    super(ElevatorScene.KEY)
    this.baseConfig = config
    this.config = config
    this.logger = logger
    this.controller = this.createController(config)
  }

  create() {
    this.gfx = this.add.graphics()
    this.buildLabels()
    this.controller.start()

    this.game.events.on('elevator:apply', ({ maxFloor }: { maxFloor: number }) => {
      void this.restart(maxFloor)
    })
    this.game.events.on('elevator:toggleRun', () => {
      void this.toggleRun()
    })
    this.game.events.on('elevator:hallCall', ({ floor, direction }: HallCallRequest) => {
      void this.report('hall', floor, () => this.controller.submitHallCall(floor, direction))
    })
    this.game.events.on('elevator:carCall', ({ floor }: CarCallRequest) => {
      void this.report('car', floor, () => this.controller.submitCarCall(floor))
    })
    this.game.events.on('elevator:riders', (req: RidersRequest) => {
      void this.spawnRiders(req)
    })
    this.game.events.on('elevator:stopRiders', () => {
      this.riders?.abort()
    })

    this.events.once(Phaser.Scenes.Events.SHUTDOWN, () => {
      this.riders?.abort()
      void this.controller.stop()
    })
  }

  update(time: number, deltaMs: number) {
    if (!this.polling && time - this.lastPoll >= POLL_INTERVAL_MS) {
      this.lastPoll = time
      void this.poll()
    }

    if (this.snapshot) {
      // Ease toward the reported floor so single-floor steps read as motion
      const target = this.snapshot.state.floor
      const step = Math.min(1, deltaMs / 150)
      this.displayFloor += (target - this.displayFloor) * step
      if (Math.abs(target - this.displayFloor) < 0.01) this.displayFloor = target
    }

    this.calcLayout()
    this.draw()
  }

  private createController(config: DispatchConfig) {
    return new ElevatorController({ config, logger: this.logger.child('Dispatch') })
  }

  private async restart(maxFloor: number) {
    this.riders?.abort()
    await this.controller.stop()
    try {
      this.config = { ...this.baseConfig, maxFloor }
      this.controller = this.createController(this.config)
    } catch (err) {
      this.logger.error(`Cannot restart with ${maxFloor} floors: ${describeError(err)}`)
      this.config = this.baseConfig
      this.controller = this.createController(this.config)
    }
    this.snapshot = null
    this.displayFloor = 1
    this.buildLabels()
    this.controller.start()
  }

  private async toggleRun() {
    if (this.controller.status().running) await this.controller.stop()
    else this.controller.start()
  }

  private async report(kind: CallReport['kind'], floor: number, submit: () => Promise<CallResult>) {
    let result: CallReport['result']
    try {
      result = await submit()
    } catch (err) {
      this.logger.error(`${kind} call to floor ${floor} failed: ${describeError(err)}`)
      result = 'error'
    }
    const report: CallReport = { kind, floor, result }
    this.game.events.emit('elevator:callResult', report)
  }

  private async spawnRiders({ count, durationMs }: RidersRequest) {
    this.riders?.abort()
    const abort = new AbortController()
    this.riders = abort
    // Stopped and replaced runs are always aborted; their late results are dropped
    const emitStats = (summary: RideSummary) => {
      if (!abort.signal.aborted) this.game.events.emit('elevator:rideStats', summary)
    }
    try {
      const summary = await runRiders(this.controller, {
        riders: count,
        durationMs,
        maxFloor: this.config.maxFloor,
        signal: abort.signal,
        onRide: (_ride, stats) => emitStats(stats.summary()),
      }, this.logger.child('Riders'))
      emitStats(summary)
    } catch (err) {
      this.logger.error(`Riders stopped: ${describeError(err)}`)
    } finally {
      if (this.riders === abort) this.riders = null
    }
  }

  private async poll() {
    this.polling = true
    try {
      const [state, queues] = await Promise.all([this.controller.getState(), this.controller.getQueues()])
      this.snapshot = { state, queues, running: this.controller.status().running }
      this.game.events.emit('elevator:snapshot', this.snapshot)
    } catch (err) {
      this.logger.warn(`Polling failed: ${describeError(err)}`)
    } finally {
      this.polling = false
    }
  }

  private buildLabels() {
    for (const label of this.floorLabels) label.destroy()
    this.floorLabels = []
    for (let f = 1; f <= this.config.maxFloor; f++) {
      this.floorLabels.push(this.add.text(0, 0, `${f}`, { fontFamily: 'monospace', fontSize: '12px', color: '#a5b0bf' }))
    }
  }

  private calcLayout() {
    const usableHeight = this.scale.height - this.topMargin * 2
    this.floorHeight = Math.max(14, Math.min(48, Math.floor(usableHeight / this.config.maxFloor)))
  }

  private floorY(floor: number) {
    return this.scale.height - this.topMargin - (floor - 1) * this.floorHeight
  }

  private draw() {
    this.gfx.clear()

    const shaftX = Math.floor(this.scale.width / 2 - this.shaftWidth / 2)
    const top = this.floorY(this.config.maxFloor) - this.floorHeight
    const bottom = this.floorY(1)

    // shaft
    this.gfx.fillStyle(0x11151b, 1)
    this.gfx.fillRect(shaftX, top, this.shaftWidth, bottom - top)
    this.gfx.lineStyle(1, 0x2a2f3a, 1)
    this.gfx.strokeRect(shaftX, top, this.shaftWidth, bottom - top)

    // floor lines and labels
    this.gfx.lineStyle(1, 0x384253, 1)
    for (let f = 1; f <= this.config.maxFloor; f++) {
      const y = this.floorY(f)
      this.gfx.lineBetween(shaftX - 80, y, shaftX + this.shaftWidth + 80, y)
      this.floorLabels[f - 1]?.setPosition(shaftX - 110, y - this.floorHeight / 2 - 6)
    }

    if (!this.snapshot) return
    const { state, queues, running } = this.snapshot

    // pending calls: up queue on the right, down queue on the left
    this.gfx.fillStyle(0x58d68d, 1)
    for (const f of queues.up) {
      const y = this.floorY(f) - this.floorHeight / 2
      const x = shaftX + this.shaftWidth + 20
      this.gfx.fillTriangle(x, y - 6, x - 6, y + 4, x + 6, y + 4)
    }
    this.gfx.fillStyle(0xff6b6b, 1)
    for (const f of queues.down) {
      const y = this.floorY(f) - this.floorHeight / 2
      const x = shaftX - 20
      this.gfx.fillTriangle(x, y + 6, x - 6, y - 4, x + 6, y - 4)
    }

    // cab
    const cabH = this.floorHeight - 4
    const cabY = this.floorY(this.displayFloor) - this.floorHeight + 2
    const border = !running ? 0x6c7380 : state.direction === 'idle' ? 0x58d68d : 0x59c1ff
    this.gfx.fillStyle(0x223040, 1)
    this.gfx.fillRect(shaftX + 4, cabY, this.shaftWidth - 8, cabH)
    this.gfx.lineStyle(2, border, 1)
    this.gfx.strokeRect(shaftX + 4, cabY, this.shaftWidth - 8, cabH)

    // direction indicator
    if (state.direction !== 'idle') {
      const midX = shaftX + this.shaftWidth / 2
      const midY = cabY + cabH / 2
      const up = state.direction === 'up'
      this.gfx.fillStyle(up ? 0x58d68d : 0xff6b6b, 1)
      if (up) this.gfx.fillTriangle(midX, midY - 6, midX - 7, midY + 5, midX + 7, midY + 5)
      else this.gfx.fillTriangle(midX, midY + 6, midX - 7, midY - 5, midX + 7, midY - 5)
    }
  }
}
