import { Pool } from 'pg'
import { DEFAULT_STATUS_DIR } from './flows/file-signaler'
import { DEFAULT_QUEUE_SIZE } from './flows/hub'
import { Logger, StatusSource } from './types'

export type EnvConfig = {
  port: number
  host: string
  postgresUrl?: string
  bearerToken?: string
  jwtSecret?: string
  statusDir: string
  hubQueueSize: number
  statusSource: StatusSource
  enableWebSocket: boolean
  enableStubProvider: boolean
}

/**
 * Reads the process environment into an `EnvConfig`, falling back to defaults
 * for anything unset or unparsable and logging what it ended up with.
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env, logger: Logger = console): EnvConfig {
  const toBool = (value: string | undefined, fallback = false) => {
    if (value === undefined) return fallback
    return ['1', 'true', 'yes', 'on'].includes(value.toLowerCase())
  }
  const toInt = (value: string | undefined, fallback: number) => {
    const parsed = Number.parseInt(value || '', 10)
    return Number.isNaN(parsed) || parsed <= 0 ? fallback : parsed
  }

  const parsed: EnvConfig = {
    port: toInt(env.PORT, 3001),
    host: env.HOST || '0.0.0.0',
    postgresUrl: env.POSTGRES_URL || env.DATABASE_URL,
    bearerToken: env.BEARER_TOKEN,
    jwtSecret: env.JWT_SECRET,
    statusDir: env.FLOWLINE_STATUS_DIR || DEFAULT_STATUS_DIR,
    hubQueueSize: toInt(env.FLOWLINE_HUB_QUEUE_SIZE, DEFAULT_QUEUE_SIZE),
    statusSource: env.FLOWLINE_STATUS_SOURCE === 'live' ? 'live' : 'file',
    enableWebSocket: toBool(env.ENABLE_WEBSOCKET, true),
    enableStubProvider: toBool(env.FLOWLINE_STUB_PROVIDER, false),
  }

  if (env.FLOWLINE_STATUS_SOURCE && !['file', 'live'].includes(env.FLOWLINE_STATUS_SOURCE)) {
    logger.warn(`[env] FLOWLINE_STATUS_SOURCE=${env.FLOWLINE_STATUS_SOURCE} not recognised; using "file".`)
  }

  if (!parsed.postgresUrl) {
    logger.warn('[env] POSTGRES_URL not set; flows and ledger live in memory (not durable).')
  }

  if (!parsed.bearerToken && !parsed.jwtSecret) {
    logger.warn('[env] No auth configured; /api/ endpoints will run open unless upstream auth is enforced.')
  }

  logger.info('[env] loaded', {
    port: parsed.port,
    host: parsed.host,
    postgres: !!parsed.postgresUrl,
    ws: parsed.enableWebSocket,
    statusDir: parsed.statusDir,
    statusSource: parsed.statusSource,
  })

  return parsed
}

export function buildPostgresPool(connectionString?: string): Pool | null {
  if (!connectionString) return null
  return new Pool({ connectionString })
}
