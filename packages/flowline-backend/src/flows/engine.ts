import { GenerationResult, GenerationService } from '../ai/gateway'
import { CredentialStore } from '../credentials'
import {
  GenerationError,
  LedgerWriteError,
  MissingCredentialError,
  UnsupportedProviderError,
  errorMessage,
} from '../errors'
import { Ledger, NewLedgerEntry, hashPrompt } from '../ledger'
import { Logger } from '../types'
import { loadFlowGraph } from './graph'
import { Broadcaster } from './hub'
import {
  LifecycleMessage,
  encodeMessage,
  flowCompleted,
  flowFailed,
  flowStarted,
  nodeCompleted,
  nodeStarted,
} from './messages'
import { FlowRepository } from './repository'
import { Signaler } from './signaler'
import { FlowNode, FlowRunSummary, FlowStatus } from './types'

export interface FlowEngineOptions {
  repository: FlowRepository
  credentials: CredentialStore
  generation: GenerationService
  ledger: Ledger
  hub?: Broadcaster
  signalers?: {
    /** Written first on every transition. */
    durable?: Signaler
    live?: Signaler
  }
  logger?: Logger
}

const NO_USAGE = { inputTokens: 0, outputTokens: 0, cost: 0 }

/**
 * Runs a stored flow node by node, in the order the nodes are stored; edges
 * are not consulted. The first hard failure aborts the run: no retry, no
 * further nodes, no rollback of ledger rows already written.
 *
 * Nothing here stops two executions of the same flow id from overlapping;
 * callers that need that guarantee must hold their own per-flow lock.
 */
export class FlowEngine {
  private readonly logger: Logger

  constructor(private readonly opts: FlowEngineOptions) {
    this.logger = opts.logger || console
  }

  /**
   * Resolves with a summary once the flow completes; rejects with the aborting
   * error after FLOW_FAILED has been emitted. A missing flow or an unparsable
   * graph rejects before anything is emitted or written.
   */
  async execute(flowId: number): Promise<FlowRunSummary> {
    const graph = await loadFlowGraph(this.opts.repository, flowId)
    const startedAt = Date.now()

    this.emit(flowStarted(flowId))
    await this.notify({ flowId, status: 'RUNNING', updatedAt: new Date().toISOString() })

    let nodesExecuted = 0
    try {
      for (const node of graph.nodes) {
        if (node.type !== 'agent') continue
        await this.runNode(flowId, node)
        nodesExecuted += 1
      }
    } catch (err) {
      const message = errorMessage(err)
      this.logger.error('[flow] run failed', { flowId, error: message })
      this.emit(flowFailed(flowId, message))
      await this.notify({ flowId, status: 'FAILED', updatedAt: new Date().toISOString(), error: message })
      throw err
    }

    const executionTimeMs = Date.now() - startedAt
    this.emit(flowCompleted(flowId, executionTimeMs))
    await this.notify({ flowId, status: 'COMPLETED', updatedAt: new Date().toISOString() })
    this.logger.info('[flow] run completed', { flowId, executionTimeMs, nodesExecuted })
    return { flowId, status: 'COMPLETED', executionTimeMs, nodesExecuted }
  }

  private async runNode(flowId: number, node: FlowNode) {
    const { provider, role, prompt, label } = node.data
    this.emit(nodeStarted(flowId, node.id, label))
    await this.notify({ flowId, status: 'RUNNING', lastNode: node.id, updatedAt: new Date().toISOString() })

    const secret = await this.resolveSecret(provider)
    if (!this.opts.generation.supports(provider)) throw new UnsupportedProviderError(provider)

    const started = Date.now()
    let result: GenerationResult | undefined
    let failure: unknown
    try {
      result = await this.opts.generation.execute(role, prompt, secret, provider)
    } catch (err) {
      failure = err
      this.logger.warn('[flow] node execution failed', { flowId, nodeId: node.id, error: errorMessage(err) })
    }
    const latencyMs = Date.now() - started

    const usage = result ?? NO_USAGE
    this.emit(nodeCompleted(flowId, node.id, usage))

    await this.record({
      flowId,
      provider,
      role,
      promptHash: hashPrompt(prompt),
      inputTokens: usage.inputTokens,
      outputTokens: usage.outputTokens,
      cost: usage.cost,
      latencyMs,
      status: failure === undefined ? 'SUCCESS' : 'FAILED',
      errorMessage: failure === undefined ? undefined : errorMessage(failure),
    })

    if (failure !== undefined) {
      throw new GenerationError(`node ${node.id} failed: ${errorMessage(failure)}`, { cause: failure })
    }
  }

  private async resolveSecret(provider: string): Promise<string> {
    let secret: string | null
    try {
      secret = await this.opts.credentials.get(provider)
    } catch (err) {
      throw new MissingCredentialError(provider, { cause: err })
    }
    if (!secret) throw new MissingCredentialError(provider)
    return secret
  }

  private async record(entry: NewLedgerEntry) {
    try {
      await this.opts.ledger.append(entry)
    } catch (err) {
      const failure = new LedgerWriteError(`failed to log to ledger: ${errorMessage(err)}`, { cause: err })
      this.logger.warn('[ledger] append failed', { flowId: entry.flowId, error: failure.message })
    }
  }

  private emit(message: LifecycleMessage) {
    if (!this.opts.hub) return
    try {
      this.opts.hub.broadcast(encodeMessage(message))
    } catch (err) {
      this.logger.warn('[hub] broadcast failed', { type: message.type, error: errorMessage(err) })
    }
  }

  /** Durable channel first, then live; neither failure reaches the run. */
  private async notify(status: FlowStatus) {
    const { durable, live } = this.opts.signalers || {}
    for (const [channel, signaler] of [['durable', durable], ['live', live]] as const) {
      if (!signaler) continue
      try {
        await signaler.notifyStatus(status.flowId, status)
      } catch (err) {
        this.logger.warn('[signal] status notification failed', { channel, flowId: status.flowId, error: errorMessage(err) })
      }
    }
  }
}
