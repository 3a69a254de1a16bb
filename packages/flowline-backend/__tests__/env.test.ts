import path from 'path'
import { describe, expect, it, vi } from 'vitest'
import { buildPostgresPool, loadEnvConfig } from '../src/env'
import { noopLogger } from './helpers'

describe('loadEnvConfig', () => {
  it('applies defaults', () => {
    expect(loadEnvConfig({}, noopLogger)).toEqual({
      port: 3001,
      host: '0.0.0.0',
      postgresUrl: undefined,
      bearerToken: undefined,
      jwtSecret: undefined,
      statusDir: path.join('.flowline', 'status'),
      hubQueueSize: 256,
      statusSource: 'file',
      enableWebSocket: true,
      enableStubProvider: false,
    })
  })

  it('reads overrides', () => {
    const config = loadEnvConfig(
      {
        PORT: '8080',
        DATABASE_URL: 'postgres://localhost/flowline',
        BEARER_TOKEN: 'test-secret',
        FLOWLINE_STATUS_DIR: '/var/flowline',
        FLOWLINE_HUB_QUEUE_SIZE: '16',
        FLOWLINE_STATUS_SOURCE: 'live',
        ENABLE_WEBSOCKET: 'off',
        FLOWLINE_STUB_PROVIDER: 'yes',
      },
      noopLogger,
    )
    expect(config).toMatchObject({
      port: 8080,
      postgresUrl: 'postgres://localhost/flowline',
      bearerToken: 'test-secret',
      statusDir: '/var/flowline',
      hubQueueSize: 16,
      statusSource: 'live',
      enableWebSocket: false,
      enableStubProvider: true,
    })
  })

  it('falls back on unparsable values and warns about them', () => {
    const logger = { ...noopLogger, warn: vi.fn() }
    const config = loadEnvConfig({ PORT: 'abc', FLOWLINE_HUB_QUEUE_SIZE: '-3', FLOWLINE_STATUS_SOURCE: 'disk' }, logger)
    expect(config.port).toBe(3001)
    expect(config.hubQueueSize).toBe(256)
    expect(config.statusSource).toBe('file')
    expect(logger.warn).toHaveBeenCalledWith('[env] FLOWLINE_STATUS_SOURCE=disk not recognised; using "file".')
  })
})

describe('buildPostgresPool', () => {
  it('returns null without a connection string', () => {
    expect(buildPostgresPool(undefined)).toBeNull()
  })
})
