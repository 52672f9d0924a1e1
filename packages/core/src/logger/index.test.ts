import { describe, it, expect, afterEach, vi } from 'vitest'
import { createLogger, createSilentLogger } from './index.js'

afterEach(() => {
  vi.unstubAllEnvs()
})

describe('createLogger', () => {
  it('creates logger with specified level', () => {
    vi.stubEnv('NODE_ENV', 'production')
    const logger = createLogger({ level: 'debug', pretty: false })
    expect(logger.level).toBe('debug')
  })

  it('names the logger after the project', () => {
    vi.stubEnv('NODE_ENV', 'production')
    const logger = createLogger({ level: 'info', pretty: false })
    expect(logger.bindings()).toEqual({ name: 'blob-datastore' })
  })

  it('no pino-pretty when pretty: false in production', () => {
    vi.stubEnv('NODE_ENV', 'production')
    const logger = createLogger({ level: 'warn', pretty: false })
    expect(logger.level).toBe('warn')
  })

  it('logger has standard pino methods', () => {
    vi.stubEnv('NODE_ENV', 'production')
    const logger = createLogger({ level: 'info', pretty: false })

    expect(typeof logger.info).toBe('function')
    expect(typeof logger.error).toBe('function')
    expect(typeof logger.debug).toBe('function')
    expect(typeof logger.child).toBe('function')
  })
})

describe('createSilentLogger', () => {
  it('disables all output', () => {
    const logger = createSilentLogger()
    expect(logger.level).toBe('silent')
    expect(logger.isLevelEnabled('fatal')).toBe(false)
  })
})
