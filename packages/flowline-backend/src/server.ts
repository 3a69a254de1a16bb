import dotenv from 'dotenv'
import { createServer as createHttpServer } from 'http'
import { buildPostgresPool, loadEnvConfig } from './env'
import { createFlowlineServer } from './index'
import { sendError } from './flows/api'
import { PostgresFlowRepository } from './flows/repository'
import { PostgresLedger } from './ledger'
import { Logger } from './types'

/**
 * Container entrypoint: reads `.env` and the environment, picks Postgres or
 * in-memory storage and starts listening with the WebSocket hub attached.
 */
async function main() {
  dotenv.config()

  const logger: Logger = {
    info: (...args) => console.log('[info]', new Date().toISOString(), ...args),
    warn: (...args) => console.warn('[warn]', new Date().toISOString(), ...args),
    error: (...args) => console.error('[error]', new Date().toISOString(), ...args),
    debug: (...args) => console.debug('[debug]', new Date().toISOString(), ...args),
  }

  const env = loadEnvConfig(process.env, logger)
  const pool = buildPostgresPool(env.postgresUrl)
  const repository = pool ? new PostgresFlowRepository(pool) : undefined
  const ledger = pool ? new PostgresLedger(pool) : undefined
  await repository?.init()
  await ledger?.init()

  const backend = createFlowlineServer({
    logger,
    flows: { repository },
    ledger,
    hub: { queueSize: env.hubQueueSize },
    status: { dir: env.statusDir, defaultSource: env.statusSource },
    transports: { enableWebSocket: env.enableWebSocket },
    auth: {
      bearerToken: env.bearerToken,
      jwtSecret: env.jwtSecret,
    },
    providers: { enableStub: env.enableStubProvider },
  })

  const httpServer =
    backend.httpServer ||
    createHttpServer((req, res) => {
      backend.handler(req, res).catch((err) => sendError(res, err, logger))
    })
  await new Promise<void>((resolve) => httpServer.listen(env.port, env.host, resolve))

  logger.info('[startup] flowline backend listening', { host: env.host, port: env.port, ws: env.enableWebSocket })

  const shutdown = () => {
    logger.info('[startup] shutting down')
    backend
      .close()
      .then(() => (httpServer.listening ? new Promise<void>((resolve) => httpServer.close(() => resolve())) : undefined))
      .then(() => pool?.end())
      .then(() => process.exit(0))
      .catch((err) => {
        logger.error('[startup] shutdown failed', err)
        process.exit(1)
      })
  }
  process.on('SIGINT', shutdown)
  process.on('SIGTERM', shutdown)
}

main().catch((err) => {
  console.error('[fatal] backend failed to start', err)
  process.exit(1)
})
