import { describe, it, expect } from 'vitest'
import { loadEnv } from '../lib/env'
import { createLogger } from '../lib/logger'

describe('loadEnv', () => {
  it('defaults LOG_LEVEL to info', () => {
    expect(loadEnv({})).toEqual({ LOG_LEVEL: 'info' })
  })

  it('accepts any casing', () => {
    expect(loadEnv({ LOG_LEVEL: 'DEBUG' })).toEqual({ LOG_LEVEL: 'debug' })
  })

  it('throws on an unknown level', () => {
    expect(() => loadEnv({ LOG_LEVEL: 'verbose' })).toThrow(
      'Invalid LOG_LEVEL: verbose. Expected one of debug, info, warn, error.',
    )
  })
})

describe('createLogger', () => {
  it('drops entries below the configured level', () => {
    const lines: string[] = []
    const logger = createLogger({
      level: 'warn',
      write: (line) => lines.push(line),
      now: () => new Date('2026-03-04T05:06:07.000Z'),
    })

    logger.debug('a')
    logger.info('b')
    logger.warn('c', { n: 1 })
    logger.error('d')

    expect(lines).toEqual([
      '{"ts":"2026-03-04T05:06:07.000Z","level":"warn","event":"c","n":1}\n',
      '{"ts":"2026-03-04T05:06:07.000Z","level":"error","event":"d"}\n',
    ])
  })
})
