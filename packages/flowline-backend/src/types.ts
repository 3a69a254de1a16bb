import type { IncomingHttpHeaders, Server as HttpServer } from 'http'
import type { WebSocketServer } from 'ws'
import type { AuthService } from './auth'
import type { CredentialStore } from './credentials'
import type { FlowEngine } from './flows/engine'
import type { Hub } from './flows/hub'
import type { FlowRepository } from './flows/repository'
import type { Signaler } from './flows/signaler'
import type { GenerationService } from './ai/gateway'
import type { Ledger } from './ledger'

export interface Logger {
  info(...args: unknown[]): void
  warn(...args: unknown[]): void
  error(...args: unknown[]): void
  debug?(...args: unknown[]): void
}

export type StatusSource = 'file' | 'live'

/** What the handlers read from a request; `http.IncomingMessage` satisfies it. */
export type RequestLike = AsyncIterable<unknown> & {
  method?: string
  url?: string
  headers: IncomingHttpHeaders
}

/** What the handlers write to; `http.ServerResponse` satisfies it. */
export interface ResponseLike {
  statusCode: number
  setHeader(name: string, value: string): unknown
  end(body?: string): unknown
}

export interface FlowlineServerConfig {
  logger?: Logger
  flows?: {
    repository?: FlowRepository
  }
  ledger?: Ledger
  credentials?: CredentialStore
  generation?: GenerationService
  hub?: {
    instance?: Hub
    queueSize?: number
  }
  status?: {
    /** Directory holding one `<flowId>.json` file per flow. */
    dir?: string
    /** Signaler backing the status endpoint when the request does not choose. */
    defaultSource?: StatusSource
  }
  transports?: {
    enableWebSocket?: boolean
  }
  auth?: {
    bearerToken?: string
    jwtSecret?: string
    issuer?: string
    audience?: string
  }
  providers?: {
    /** Registers the zero-cost Stub provider alongside the real ones. */
    enableStub?: boolean
  }
}

export interface FlowlineServer {
  handler: (req: RequestLike, res: ResponseLike, next?: () => void) => Promise<void>
  hub: Hub
  engine: FlowEngine
  signalers: { live: Signaler; durable: Signaler }
  /** Present when a JWT secret is configured. */
  auth?: AuthService
  httpServer?: HttpServer
  wss?: WebSocketServer
  close(): Promise<void>
}
