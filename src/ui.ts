import Phaser from 'phaser'
import type { CallReport, ViewerSnapshot } from './scenes/ElevatorScene'
import type { DispatchConfig } from './sim/config'
import { describeError } from './sim/errors'
import type { RideSummary } from './sim/riders'
import { parseTravelDirection } from './sim/state'

function getEl<T extends HTMLElement>(id: string, type: { new (): T }): T {
  const el = document.getElementById(id)
  if (!(el instanceof type)) throw new Error(`Missing #${id}`)
  return el
}

const CALL_RESULT_TEXT: Record<CallReport['result'], string> = {
  ok: 'queued',
  alreadyThere: 'already there',
  invalidFloor: 'invalid floor',
  error: 'failed',
}

export function setupUI(game: Phaser.Game, config: DispatchConfig) {
  const maxFloorInput = getEl('maxFloor', HTMLInputElement)
  const applyBtn = getEl('apply', HTMLButtonElement)
  const runBtn = getEl('toggleRun', HTMLButtonElement)

  const hallFloor = getEl('hallFloor', HTMLInputElement)
  const hallDir = getEl('hallDir', HTMLSelectElement)
  const hallCall = getEl('hallCall', HTMLButtonElement)
  const carFloor = getEl('carFloor', HTMLInputElement)
  const carCall = getEl('carCall', HTMLButtonElement)
  const callResult = getEl('callResult', HTMLDivElement)

  const riderCount = getEl('riderCount', HTMLInputElement)
  const riderMinutes = getEl('riderMinutes', HTMLInputElement)
  const spawnRiders = getEl('spawnRiders', HTMLButtonElement)
  const stopRiders = getEl('stopRiders', HTMLButtonElement)

  const statFloor = getEl('statFloor', HTMLDivElement)
  const statDirection = getEl('statDirection', HTMLDivElement)
  const statRunning = getEl('statRunning', HTMLDivElement)
  const queueUp = getEl('queueUp', HTMLDivElement)
  const queueDown = getEl('queueDown', HTMLDivElement)
  const statCompleted = getEl('statCompleted', HTMLDivElement)
  const statAbandoned = getEl('statAbandoned', HTMLDivElement)
  const statAvgWait = getEl('statAvgWait', HTMLDivElement)
  const statMaxWait = getEl('statMaxWait', HTMLDivElement)

  let maxFloor = config.maxFloor
  maxFloorInput.value = `${maxFloor}`

  const navButtons = Array.from(document.querySelectorAll<HTMLButtonElement>('.nav-link'))
  const panels = Array.from(document.querySelectorAll<HTMLElement>('[role="tabpanel"]'))
  const showView = (view: string) => {
    navButtons.forEach(btn => {
      const active = btn.dataset.view === view
      btn.classList.toggle('active', active)
      btn.setAttribute('aria-selected', active ? 'true' : 'false')
      btn.setAttribute('tabindex', active ? '0' : '-1')
    })
    panels.forEach(panel => {
      panel.setAttribute('aria-hidden', panel.dataset.view === view ? 'false' : 'true')
    })
    document.querySelector<HTMLElement>('.app-shell')?.setAttribute('data-active-view', view)
  }
  navButtons.forEach(btn => {
    btn.addEventListener('click', () => showView(btn.dataset.view ?? 'simulation'))
  })

  const readFloor = (input: HTMLInputElement) => parseInt(input.value || '0', 10)

  applyBtn.addEventListener('click', () => {
    maxFloor = clamp(parseInt(maxFloorInput.value || '20', 10), 2, 100)
    maxFloorInput.value = `${maxFloor}`
    hallFloor.max = `${maxFloor}`
    carFloor.max = `${maxFloor}`
    game.events.emit('elevator:apply', { maxFloor })
  })

  runBtn.addEventListener('click', () => {
    game.events.emit('elevator:toggleRun')
  })

  hallCall.addEventListener('click', () => {
    try {
      game.events.emit('elevator:hallCall', { floor: readFloor(hallFloor), direction: parseTravelDirection(hallDir.value) })
    } catch (err) {
      callResult.textContent = describeError(err)
    }
  })

  carCall.addEventListener('click', () => {
    game.events.emit('elevator:carCall', { floor: readFloor(carFloor) })
  })

  spawnRiders.addEventListener('click', () => {
    const count = clamp(parseInt(riderCount.value || '10', 10), 1, 50)
    const minutes = clamp(parseFloat(riderMinutes.value || '5'), 0.5, 60)
    game.events.emit('elevator:riders', { count, durationMs: minutes * 60_000 })
  })

  stopRiders.addEventListener('click', () => {
    game.events.emit('elevator:stopRiders')
  })

  game.events.on('elevator:callResult', ({ kind, floor, result }: CallReport) => {
    callResult.textContent = `${kind === 'hall' ? 'Hall' : 'Car'} call, floor ${floor}: ${CALL_RESULT_TEXT[result]}`
  })

  game.events.on('elevator:snapshot', ({ state, queues, running }: ViewerSnapshot) => {
    statFloor.textContent = `${state.floor}`
    statDirection.textContent = state.direction === 'up' ? '↑ up' : state.direction === 'down' ? '↓ down' : '• idle'
    statDirection.className = `value dir-${state.direction}`
    statRunning.textContent = running ? 'running' : 'stopped'
    runBtn.textContent = running ? 'Stop' : 'Start'
    queueUp.textContent = queues.up.join(', ') || '—'
    queueDown.textContent = [...queues.down].reverse().join(', ') || '—'
  })

  game.events.on('elevator:rideStats', (s: RideSummary) => {
    statCompleted.textContent = `${s.completed}`
    statAbandoned.textContent = `${s.abandoned}`
    statAvgWait.textContent = s.avgWaitSec.toFixed(1)
    statMaxWait.textContent = s.maxWaitSec.toFixed(1)
  })
}

function clamp(n: number, min: number, max: number) {
  if (Number.isNaN(n)) return min
  return Math.max(min, Math.min(max, n))
}
