import './style.css'
import Phaser from 'phaser'
import { ElevatorScene } from './scenes/ElevatorScene'
import { DEFAULT_CONFIG, parseConfigParams, resolveConfig } from './sim/config'
import type { DispatchConfig } from './sim/config'
import { describeError } from './sim/errors'
import { createLogger } from './sim/logger'
import { setupUI } from './ui'

const app = document.querySelector<HTMLDivElement>('#app')
if (!app) throw new Error('Missing #app container')

let config: DispatchConfig
try {
  config = resolveConfig(parseConfigParams(new URLSearchParams(window.location.search)))
} catch (err) {
  createLogger('Viewer').warn(`Ignoring query-string config: ${describeError(err)}`)
  config = DEFAULT_CONFIG
}
const logger = createLogger('Viewer', config.logLevel)

app.innerHTML = `
  <div class="app-shell" data-active-view="simulation">
    <header class="app-header">
      <div class="brand">
        <span class="brand-title">Elevator Dispatch</span>
        <span class="brand-subtitle">Single car, SCAN</span>
      </div>
      <nav class="nav-bar" role="tablist" aria-label="Viewer sections">
        <button class="nav-link active" data-view="simulation" role="tab" aria-selected="true" aria-controls="view-simulation" id="tab-simulation" tabindex="0">Shaft</button>
        <button class="nav-link" data-view="controls" role="tab" aria-selected="false" aria-controls="view-controls" id="tab-controls" tabindex="-1">Calls</button>
        <button class="nav-link" data-view="riders" role="tab" aria-selected="false" aria-controls="view-riders" id="tab-riders" tabindex="-1">Riders</button>
        <button class="nav-link" data-view="stats" role="tab" aria-selected="false" aria-controls="view-stats" id="tab-stats" tabindex="-1">Status</button>
      </nav>
    </header>
    <main id="view-root">
      <section id="view-simulation" class="simulation-layer" role="tabpanel" data-view="simulation" aria-labelledby="tab-simulation" aria-hidden="false">
        <div id="gameParent"></div>
      </section>
      <section id="view-controls" class="view-panel" data-view="controls" role="tabpanel" aria-labelledby="tab-controls" aria-hidden="true" tabindex="-1">
        <div class="panel-scroll">
          <div class="panel-card">
            <h2 class="title">Building</h2>
            <div class="row">
              <label for="maxFloor">Floors</label>
              <input id="maxFloor" type="number" min="2" max="100"/>
            </div>
            <div class="row button-row">
              <button id="apply" class="primary">Apply &amp; Restart</button>
              <button id="toggleRun">Stop</button>
            </div>
          </div>
          <div class="panel-card">
            <h2 class="title">Hall Call</h2>
            <div class="grid-two">
              <div>
                <label for="hallFloor">Floor</label>
                <input id="hallFloor" type="number" min="1" max="${config.maxFloor}" value="1"/>
              </div>
              <div>
                <label for="hallDir">Direction</label>
                <select id="hallDir">
                  <option value="up">Up</option>
                  <option value="down">Down</option>
                </select>
              </div>
            </div>
            <div class="row button-row">
              <button id="hallCall" class="primary">Call Elevator</button>
            </div>
          </div>
          <div class="panel-card">
            <h2 class="title">Car Call</h2>
            <div class="row">
              <label for="carFloor">Destination</label>
              <input id="carFloor" type="number" min="1" max="${config.maxFloor}" value="1"/>
            </div>
            <div class="row button-row">
              <button id="carCall" class="primary">Go</button>
            </div>
            <div id="callResult" class="small"></div>
          </div>
        </div>
      </section>
      <section id="view-riders" class="view-panel" data-view="riders" role="tabpanel" aria-labelledby="tab-riders" aria-hidden="true" tabindex="-1">
        <div class="panel-scroll">
          <div class="panel-card">
            <h2 class="title">Synthetic Riders</h2>
            <div class="grid-two">
              <div>
                <label for="riderCount">Riders</label>
                <input id="riderCount" type="number" min="1" max="50" value="10"/>
              </div>
              <div>
                <label for="riderMinutes">Minutes</label>
                <input id="riderMinutes" type="number" min="0.5" max="60" step="0.5" value="5"/>
              </div>
            </div>
            <div class="row button-row">
              <button id="spawnRiders" class="primary">Spawn</button>
              <button id="stopRiders">Stop Riders</button>
            </div>
          </div>
        </div>
      </section>
      <section id="view-stats" class="view-panel" data-view="stats" role="tabpanel" aria-labelledby="tab-stats" aria-hidden="true" tabindex="-1">
        <div class="panel-scroll">
          <div class="panel-card">
            <h2 class="title">Cab</h2>
            <div class="stats">
              <div class="stat"><div class="label">Floor</div><div id="statFloor" class="value">—</div></div>
              <div class="stat"><div class="label">Direction</div><div id="statDirection" class="value">—</div></div>
              <div class="stat"><div class="label">Dispatch</div><div id="statRunning" class="value">—</div></div>
            </div>
          </div>
          <div class="panel-card">
            <h2 class="title">Queues</h2>
            <div class="call-row"><div>Up</div><div id="queueUp" class="badge up">—</div></div>
            <div class="call-row"><div>Down</div><div id="queueDown" class="badge down">—</div></div>
          </div>
          <div class="panel-card">
            <h2 class="title">Rides</h2>
            <div class="stats">
              <div class="stat"><div class="label">Completed</div><div id="statCompleted" class="value">0</div></div>
              <div class="stat"><div class="label">Abandoned</div><div id="statAbandoned" class="value">0</div></div>
              <div class="stat"><div class="label">Avg Wait (s)</div><div id="statAvgWait" class="value">0</div></div>
              <div class="stat"><div class="label">Max Wait (s)</div><div id="statMaxWait" class="value">0</div></div>
            </div>
          </div>
        </div>
      </section>
    </main>
  </div>
`

const game = new Phaser.Game({
  type: Phaser.AUTO,
  parent: 'gameParent',
  backgroundColor: '#0f1216',
  scale: {
    mode: Phaser.Scale.RESIZE,
    autoCenter: Phaser.Scale.CENTER_BOTH,
  },
  width: 800,
  height: 600,
  fps: { target: 60 },
  render: { pixelArt: false, antialias: true },
  scene: [new ElevatorScene(config, logger)],
})

setupUI(game, config)
