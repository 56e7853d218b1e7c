import { describe, expect, it } from 'vitest'
import { createLogger, createMemorySink } from './logger'

describe('createLogger', () => {
  it('drops entries below the configured level', () => {
    const { sink, entries } = createMemorySink()
    const logger = createLogger('Dispatch', 'warn', sink)

    logger.debug('moving')
    logger.info('reached floor 3')
    logger.warn('state reset')
    logger.error('tick failed')

    expect(entries.map(e => `${e.level}:${e.message}`)).toEqual(['warn:state reset', 'error:tick failed'])
    expect(logger.isEnabled('info')).toBe(false)
    expect(logger.isEnabled('error')).toBe(true)
  })

  it('tags child loggers with their own scope and keeps details', () => {
    const { sink, entries } = createMemorySink()
    const child = createLogger('Dispatch', 'debug', sink).child('Admission')

    child.info('Car call to floor 4', { queue: 'up' })

    expect(entries).toEqual([{ level: 'info', scope: 'Admission', message: 'Car call to floor 4', details: { queue: 'up' } }])
  })
})
