import { ConfigError } from './errors'
import { isLogLevel } from './logger'
import type { LogLevel } from './logger'

export interface DispatchConfig {
  maxFloor: number
  floorTravelMs: number // one floor of movement
  doorDwellMs: number
  settleWaitMs: number // pause per tick while settled idle
  tickIntervalMs: number
  // Move calls stranded on the wrong side of the cab into the other queue
  reclassifyStranded: boolean
  logLevel: LogLevel
}

export const DEFAULT_CONFIG: DispatchConfig = {
  maxFloor: 20,
  floorTravelMs: 1000,
  doorDwellMs: 2000,
  settleWaitMs: 2000,
  tickIntervalMs: 500,
  reclassifyStranded: true,
  logLevel: 'info',
}

type DurationKey = 'floorTravelMs' | 'doorDwellMs' | 'settleWaitMs' | 'tickIntervalMs'
const DURATION_KEYS: readonly DurationKey[] = ['floorTravelMs', 'doorDwellMs', 'settleWaitMs', 'tickIntervalMs']

export function resolveConfig(overrides: Partial<DispatchConfig> = {}): DispatchConfig {
  const cfg: DispatchConfig = { ...DEFAULT_CONFIG, ...overrides }

  if (!Number.isInteger(cfg.maxFloor) || cfg.maxFloor < 2) {
    throw new ConfigError('maxFloor', `expected an integer >= 2, got ${cfg.maxFloor}`)
  }
  for (const key of DURATION_KEYS) {
    const value = cfg[key]
    if (!Number.isFinite(value) || value < 0) {
      throw new ConfigError(key, `expected a non-negative number of milliseconds, got ${value}`)
    }
  }
  if (!isLogLevel(cfg.logLevel)) {
    throw new ConfigError('logLevel', `unknown level ${cfg.logLevel}`)
  }
  return cfg
}

/**
 * Reads overrides from a query string such as `?maxFloor=30&floorTravelMs=250`.
 * Unknown keys are ignored; malformed values throw {@link ConfigError}.
 */
export function parseConfigParams(params: URLSearchParams): Partial<DispatchConfig> {
  const out: Partial<DispatchConfig> = {}

  const maxFloor = params.get('maxFloor')
  if (maxFloor !== null) out.maxFloor = parseNumber('maxFloor', maxFloor)

  for (const key of DURATION_KEYS) {
    const raw = params.get(key)
    if (raw !== null) out[key] = parseNumber(key, raw)
  }

  const reclassify = params.get('reclassifyStranded')
  if (reclassify !== null) {
    if (reclassify !== 'true' && reclassify !== 'false') {
      throw new ConfigError('reclassifyStranded', `expected true or false, got ${reclassify}`)
    }
    out.reclassifyStranded = reclassify === 'true'
  }

  const logLevel = params.get('logLevel')
  if (logLevel !== null) {
    if (!isLogLevel(logLevel)) throw new ConfigError('logLevel', `unknown level ${logLevel}`)
    out.logLevel = logLevel
  }

  return out
}

function parseNumber(key: string, raw: string): number {
  const value = Number(raw)
  if (raw.trim() === '' || Number.isNaN(value)) {
    throw new ConfigError(key, `expected a number, got "${raw}"`)
  }
  return value
}
