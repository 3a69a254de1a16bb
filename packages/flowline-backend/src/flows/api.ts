import { FlowlineError, NotFoundError, errorMessage } from '../errors'
import { Logger, RequestLike, ResponseLike, StatusSource } from '../types'
import { describeErrors, validateFlowBody } from '../validation'
import { FlowEngine } from './engine'
import { FlowRepository, NewFlow } from './repository'
import { Signaler } from './signaler'

export interface FlowApiOptions {
  repository: FlowRepository
  engine: FlowEngine
  signalers: Record<StatusSource, Signaler>
  defaultSource?: StatusSource
  authenticate?: (req: RequestLike) => boolean
  logger?: Logger
}

class BadRequestError extends FlowlineError {
  constructor(code: string, message: string) {
    super(message, code, 400)
  }
}

/** Returns `false` when the request is not a flow route so the caller can keep routing. */
export function buildFlowApi({ repository, engine, signalers, defaultSource = 'file', authenticate, logger = console }: FlowApiOptions) {
  return async function handleFlow(req: RequestLike, res: ResponseLike, url: URL): Promise<boolean> {
    const segments = url.pathname.split('/').filter(Boolean)
    if (segments[0] !== 'api' || segments[1] !== 'flows') return false
    if (authenticate && !authenticate(req)) {
      sendJson(res, { error: 'unauthorized' }, 401)
      return true
    }

    try {
      return await route(req, res, url, segments.slice(2))
    } catch (err) {
      sendError(res, err, logger)
      return true
    }
  }

  async function route(req: RequestLike, res: ResponseLike, url: URL, rest: string[]): Promise<boolean> {
    if (rest.length === 0) {
      if (req.method === 'GET') {
        sendJson(res, { flows: await repository.list() })
        return true
      }
      if (req.method === 'POST') {
        const created = await repository.create(toNewFlow(await readJson(req)))
        sendJson(res, created, 201)
        return true
      }
      return false
    }

    const flowId = parseFlowId(rest[0])
    const tail = rest.slice(1)

    if (req.method === 'GET' && tail.length === 0) {
      const flow = await repository.get(flowId)
      if (!flow) throw new NotFoundError(`flow ${flowId} not found`)
      sendJson(res, flow)
      return true
    }

    if (req.method === 'PUT' && tail.length === 0) {
      const updated = await repository.update({ id: flowId, ...toNewFlow(await readJson(req)) })
      sendJson(res, updated)
      return true
    }

    if (req.method === 'DELETE' && tail.length === 0) {
      if (!(await repository.delete(flowId))) throw new NotFoundError(`flow ${flowId} not found`)
      res.statusCode = 204
      res.end()
      return true
    }

    if (req.method === 'POST' && tail[0] === 'execute' && tail.length === 1) {
      const flow = await repository.get(flowId)
      if (!flow) throw new NotFoundError(`flow ${flowId} not found`)
      engine.execute(flowId).catch((err) => {
        logger.warn('[flow] background execution rejected', { flowId, error: errorMessage(err) })
      })
      sendJson(res, { flowId, status: 'RUNNING' }, 202)
      return true
    }

    if (req.method === 'GET' && tail[0] === 'status' && tail.length === 1) {
      const source = parseSource(url.searchParams.get('source'), defaultSource)
      sendJson(res, await signalers[source].getStatus(flowId))
      return true
    }

    return false
  }
}

function parseFlowId(raw: string): number {
  if (!/^\d+$/.test(raw)) throw new BadRequestError('invalid_flow_id', `invalid flow id: ${raw}`)
  return Number.parseInt(raw, 10)
}

function parseSource(raw: string | null, fallback: StatusSource): StatusSource {
  if (raw === null || raw === '') return fallback
  if (raw === 'file' || raw === 'live') return raw
  throw new BadRequestError('invalid_source', `unknown status source: ${raw}`)
}

function toNewFlow(body: unknown): NewFlow {
  if (!validateFlowBody(body)) {
    throw new BadRequestError('invalid_body', describeErrors(validateFlowBody.errors, 'body'))
  }
  const { name, data, status } = body
  // graphs may be posted as objects; they are stored as the text the engine parses
  const text = typeof data === 'string' ? data : JSON.stringify(data ?? { nodes: [], edges: [] })
  return { name, data: text, status }
}

export async function readJson(req: RequestLike): Promise<unknown> {
  const chunks: Buffer[] = []
  for await (const chunk of req) chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)))
  const text = Buffer.concat(chunks).toString('utf8')
  if (!text) return {}
  try {
    return JSON.parse(text)
  } catch {
    throw new BadRequestError('invalid_json', 'request body is not valid JSON')
  }
}

export function sendJson(res: ResponseLike, payload: unknown, status = 200) {
  res.statusCode = status
  res.setHeader('content-type', 'application/json')
  res.end(JSON.stringify(payload))
}

export function sendError(res: ResponseLike, err: unknown, logger: Logger) {
  if (err instanceof FlowlineError) {
    sendJson(res, { error: err.code, message: err.message }, err.status)
    return
  }
  logger.error('[http] unhandled error', err)
  sendJson(res, { error: 'internal_error', message: errorMessage(err) }, 500)
}
