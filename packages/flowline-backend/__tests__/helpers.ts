import { mkdtemp } from 'fs/promises'
import type { IncomingHttpHeaders } from 'http'
import os from 'os'
import path from 'path'
import { Readable } from 'stream'
import type { GenerationResult, GenerationService } from '../src/ai/gateway'
import type { ObserverSink } from '../src/flows/hub'
import { decodeMessage, WireMessage } from '../src/flows/messages'

export const noopLogger = { info: () => {}, warn: () => {}, error: () => {}, debug: () => {} }

export function tempDir(prefix = 'flowline-') {
  return mkdtemp(path.join(os.tmpdir(), prefix))
}

/** Collects every frame synchronously, in delivery order. */
export class RecordingSink implements ObserverSink {
  readonly frames: string[] = []

  send(data: string, done: (err?: Error) => void) {
    this.frames.push(data)
    done()
  }

  messages(): WireMessage[] {
    return this.frames.map(decodeMessage).filter((m): m is WireMessage => m !== null)
  }

  /** Lifecycle events as `TYPE` or `TYPE:nodeId`, FLOW_STATUS frames left out. */
  events(flowId?: number): string[] {
    return this.messages()
      .filter((m) => m.type !== 'FLOW_STATUS')
      .filter((m) => flowId === undefined || m.payload.flowId === flowId)
      .map((m) => (typeof m.payload.nodeId === 'string' ? `${m.type}:${m.payload.nodeId}` : m.type))
  }

  /** FLOW_STATUS frames as `STATUS:lastNode`. */
  statuses(): string[] {
    return this.messages()
      .filter((m) => m.type === 'FLOW_STATUS')
      .map((m) => `${String(m.payload.status)}:${String(m.payload.lastNode)}`)
  }

  find(type: string): WireMessage | undefined {
    return this.messages().find((m) => m.type === type)
  }
}

export interface GenerationCall {
  role: string
  prompt: string
  secret: string
  provider: string
}

export class FakeGeneration implements GenerationService {
  readonly calls: GenerationCall[] = []

  constructor(
    private readonly opts: {
      known?: string[]
      delayMs?: number
      failOn?: (prompt: string) => boolean
    } = {},
  ) {}

  supports(provider: string): boolean {
    return this.providers().includes(provider)
  }

  providers(): string[] {
    return this.opts.known ?? ['Anthropic', 'OpenAI']
  }

  async execute(role: string, prompt: string, secret: string, provider: string): Promise<GenerationResult> {
    this.calls.push({ role, prompt, secret, provider })
    if (this.opts.delayMs) await new Promise((resolve) => setTimeout(resolve, this.opts.delayMs))
    if (this.opts.failOn?.(prompt)) throw new Error(`boom on ${prompt}`)
    return { text: `done: ${prompt}`, inputTokens: 10, outputTokens: 20, cost: 0.001 }
  }
}

export function agent(id: string, provider = 'Anthropic', type = 'agent') {
  return { id, type, data: { label: `Node ${id}`, role: 'coder', prompt: `task ${id}`, provider } }
}

export function graph(nodes: unknown[], edges: unknown[] = []) {
  return JSON.stringify({ nodes, edges })
}

export function makeReq(method: string, url: string, body?: unknown, headers: Record<string, string> = {}) {
  const chunks = body !== undefined ? [Buffer.from(JSON.stringify(body))] : []
  const all: IncomingHttpHeaders = { 'content-type': 'application/json' }
  for (const [name, value] of Object.entries(headers)) all[name] = value
  return Object.assign(Readable.from(chunks), { method, url, headers: all })
}

export function makeRes() {
  const chunks: string[] = []
  const headers: Record<string, string> = {}
  return {
    statusCode: 200,
    headers,
    setHeader(name: string, value: string) {
      headers[name] = value
    },
    end(body?: string) {
      if (body) chunks.push(body)
    },
    get body() {
      return chunks.join('')
    },
    json(): unknown {
      const text = chunks.join('')
      return text ? JSON.parse(text) : undefined
    },
  }
}
