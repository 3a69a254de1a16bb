import { createServer as createHttpServer, Server as HttpServer } from 'http'
import { WebSocketServer } from 'ws'
import { buildProviderRegistry, ProviderGateway } from './ai/gateway'
import { FetchHttpClient } from './ai/providers/http'
import { AuthService, buildAuthenticator } from './auth'
import { EnvCredentialStore } from './credentials'
import { errorMessage } from './errors'
import { buildFlowApi, sendError, sendJson } from './flows/api'
import { FlowEngine } from './flows/engine'
import { FileSignaler } from './flows/file-signaler'
import { Hub } from './flows/hub'
import { encodeMessage, welcome } from './flows/messages'
import { MemoryFlowRepository } from './flows/repository'
import { HubSignaler } from './flows/signaler'
import { MemoryLedger } from './ledger'
import { FlowlineServer, FlowlineServerConfig, Logger } from './types'

function getLogger(logger?: Logger): Logger {
  const base: Logger = console
  return { ...base, ...(logger || {}) }
}

export function createFlowlineServer(config: FlowlineServerConfig = {}): FlowlineServer {
  const logger = getLogger(config.logger)
  const hub = config.hub?.instance || new Hub({ queueSize: config.hub?.queueSize, logger })
  const signalers = {
    live: new HubSignaler(hub, logger),
    durable: new FileSignaler(config.status?.dir),
  }
  const repository = config.flows?.repository || new MemoryFlowRepository()
  const ledger = config.ledger || new MemoryLedger()
  const generation =
    config.generation ||
    new ProviderGateway(buildProviderRegistry(new FetchHttpClient(), { enableStub: config.providers?.enableStub }), logger)

  const engine = new FlowEngine({
    repository,
    ledger,
    generation,
    credentials: config.credentials || new EnvCredentialStore(),
    hub,
    signalers,
    logger,
  })

  const auth = config.auth?.jwtSecret
    ? new AuthService({
        accessSecret: config.auth.jwtSecret,
        issuer: config.auth.issuer,
        audience: config.auth.audience,
        logger,
      })
    : undefined
  const ensureAuth = buildAuthenticator({ bearerToken: config.auth?.bearerToken, auth })

  const flowApi = buildFlowApi({
    repository,
    engine,
    signalers: { file: signalers.durable, live: signalers.live },
    defaultSource: config.status?.defaultSource,
    authenticate: ensureAuth,
    logger,
  })

  const handler: FlowlineServer['handler'] = async (req, res, next) => {
    const url = new URL(req.url || '/', 'http://localhost')
    if (req.method === 'GET' && url.pathname === '/healthz') return sendJson(res, { ok: true })
    if (req.method === 'GET' && url.pathname === '/readyz') return sendJson(res, { ready: true, observers: hub.size })

    if (await flowApi(req, res, url)) return

    if (url.pathname.startsWith('/api/') && !ensureAuth(req)) return sendJson(res, { error: 'unauthorized' }, 401)

    try {
      if (req.method === 'GET' && url.pathname === '/api/ledger') {
        const raw = url.searchParams.get('flowId')
        const flowId = raw && /^\d+$/.test(raw) ? Number.parseInt(raw, 10) : undefined
        if (raw && flowId === undefined) return sendJson(res, { error: 'invalid_flow_id' }, 400)
        return sendJson(res, { entries: await ledger.list({ flowId }) })
      }

      if (req.method === 'GET' && url.pathname === '/api/providers') {
        return sendJson(res, { providers: generation.providers() })
      }
    } catch (err) {
      return sendError(res, err, logger)
    }

    if (next) return next()
    sendJson(res, { error: 'not_found' }, 404)
  }

  const server: FlowlineServer = {
    handler,
    hub,
    engine,
    signalers,
    auth,
    async close() {
      hub.close()
      const wss = server.wss
      if (wss) await new Promise<void>((resolve) => wss.close(() => resolve()))
      const http = server.httpServer
      if (http?.listening) {
        await new Promise<void>((resolve, reject) => http.close((err) => (err ? reject(err) : resolve())))
      }
    },
  }

  if (config.transports?.enableWebSocket) {
    const http = createHttpServer((req, res) => {
      handler(req, res).catch((err) => sendError(res, err, logger))
    })
    server.httpServer = http
    server.wss = attachWs(http, hub, logger)
  }

  return server
}

/** Every upgraded connection becomes a hub observer until it closes or errors. */
function attachWs(http: HttpServer, hub: Hub, logger: Logger) {
  const wss = new WebSocketServer({ server: http })
  wss.on('connection', (ws) => {
    const observerId = hub.attach(ws)
    hub.sendTo(observerId, encodeMessage(welcome(observerId)))
    ws.on('close', () => hub.detach(observerId))
    ws.on('error', (err) => {
      logger.warn('[hub] socket error', { observerId, error: errorMessage(err) })
      hub.detach(observerId)
    })
  })
  return wss
}

export { AuthService } from './auth'
export { EnvCredentialStore, MemoryCredentialStore } from './credentials'
export * from './errors'
export { ProviderGateway, buildProviderRegistry, calculateCost } from './ai/gateway'
export { ProviderRegistry } from './ai/providers/registry'
export { FetchHttpClient } from './ai/providers/http'
export { FlowEngine } from './flows/engine'
export { FileSignaler, DEFAULT_STATUS_DIR } from './flows/file-signaler'
export { parseFlowGraph } from './flows/graph'
export { Hub } from './flows/hub'
export { decodeMessage, encodeMessage, welcome } from './flows/messages'
export { MemoryFlowRepository, PostgresFlowRepository } from './flows/repository'
export { HubSignaler } from './flows/signaler'
export { MemoryLedger, PostgresLedger } from './ledger'
export type { FlowlineServerConfig, FlowlineServer, Logger, StatusSource } from './types'
export type { Signaler } from './flows/signaler'
export type { FlowDefinition, FlowGraph, FlowStatus, FlowRunSummary } from './flows/types'
export type { LifecycleMessage, OutboundMessage, WelcomeMessage, WireMessage } from './flows/messages'
export type { GenerationService, GenerationResult } from './ai/gateway'
export type { CredentialStore } from './credentials'
export type { Ledger, LedgerEntry } from './ledger'
