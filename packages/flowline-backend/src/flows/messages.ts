import { FlowStatus } from './types'

interface BasePayload {
  flowId: number
  /** RFC 3339 timestamp stamped when the message is built. */
  timestamp: string
}

export interface NodeStartedPayload extends BasePayload {
  nodeId: string
  label: string
}

export interface NodeCompletedPayload extends BasePayload {
  nodeId: string
  inputTokens: number
  outputTokens: number
  cost: number
}

export interface FlowCompletedPayload extends BasePayload {
  executionTimeMs: number
}

export interface FlowFailedPayload extends BasePayload {
  error: string
}

export interface FlowStatusPayload extends BasePayload {
  status: FlowStatus['status']
  lastNode: string
  updatedAt: string
  error: string
}

export type LifecycleMessage =
  | { readonly type: 'FLOW_STARTED'; readonly payload: Readonly<BasePayload> }
  | { readonly type: 'NODE_STARTED'; readonly payload: Readonly<NodeStartedPayload> }
  | { readonly type: 'NODE_COMPLETED'; readonly payload: Readonly<NodeCompletedPayload> }
  | { readonly type: 'FLOW_COMPLETED'; readonly payload: Readonly<FlowCompletedPayload> }
  | { readonly type: 'FLOW_FAILED'; readonly payload: Readonly<FlowFailedPayload> }
  | { readonly type: 'FLOW_STATUS'; readonly payload: Readonly<FlowStatusPayload> }

/** Sent once to each observer as it attaches; not tied to a flow. */
export type WelcomeMessage = {
  readonly type: 'WELCOME'
  readonly payload: Readonly<{ observerId: string; timestamp: string }>
}

export type OutboundMessage = LifecycleMessage | WelcomeMessage
export type OutboundMessageType = OutboundMessage['type']

export const MESSAGE_TYPES: readonly OutboundMessageType[] = [
  'FLOW_STARTED',
  'NODE_STARTED',
  'NODE_COMPLETED',
  'FLOW_COMPLETED',
  'FLOW_FAILED',
  'FLOW_STATUS',
  'WELCOME',
]

/** Any `{type, payload}` envelope read off the wire, including kinds this build does not know. */
export interface WireMessage {
  type: string
  payload: Record<string, unknown>
  /** False for kinds outside MESSAGE_TYPES; consumers skip those. */
  known: boolean
}

const stamp = () => new Date().toISOString()

function seal<T extends OutboundMessage>(message: T): T {
  Object.freeze(message.payload)
  return Object.freeze(message)
}

export function flowStarted(flowId: number): LifecycleMessage {
  return seal({ type: 'FLOW_STARTED', payload: { flowId, timestamp: stamp() } })
}

export function nodeStarted(flowId: number, nodeId: string, label: string): LifecycleMessage {
  return seal({ type: 'NODE_STARTED', payload: { flowId, nodeId, label, timestamp: stamp() } })
}

export function nodeCompleted(
  flowId: number,
  nodeId: string,
  usage: { inputTokens: number; outputTokens: number; cost: number },
): LifecycleMessage {
  return seal({
    type: 'NODE_COMPLETED',
    payload: {
      flowId,
      nodeId,
      inputTokens: usage.inputTokens,
      outputTokens: usage.outputTokens,
      cost: usage.cost,
      timestamp: stamp(),
    },
  })
}

export function flowCompleted(flowId: number, executionTimeMs: number): LifecycleMessage {
  return seal({ type: 'FLOW_COMPLETED', payload: { flowId, executionTimeMs, timestamp: stamp() } })
}

export function flowFailed(flowId: number, error: string): LifecycleMessage {
  return seal({ type: 'FLOW_FAILED', payload: { flowId, error, timestamp: stamp() } })
}

/** Legacy status snapshot pushed by the live signaler. */
export function flowStatusMessage(status: FlowStatus): LifecycleMessage {
  return seal({
    type: 'FLOW_STATUS',
    payload: {
      flowId: status.flowId,
      status: status.status,
      lastNode: status.lastNode ?? '',
      updatedAt: status.updatedAt,
      error: status.error ?? '',
      timestamp: stamp(),
    },
  })
}

export function welcome(observerId: string): WelcomeMessage {
  return seal({ type: 'WELCOME', payload: { observerId, timestamp: stamp() } })
}

export function encodeMessage(message: OutboundMessage): string {
  return JSON.stringify({ type: message.type, payload: message.payload })
}

/**
 * Reads an envelope back. Unknown kinds are returned with `known: false` so
 * consumers can skip them; anything that is not a `{type, payload}` object
 * yields null.
 */
export function decodeMessage(raw: string): WireMessage | null {
  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch {
    return null
  }
  if (typeof parsed !== 'object' || parsed === null || !('type' in parsed) || !('payload' in parsed)) return null
  const { type, payload } = parsed
  if (typeof type !== 'string' || typeof payload !== 'object' || payload === null || Array.isArray(payload)) return null
  return { type, payload: Object.fromEntries(Object.entries(payload)), known: isKnownMessageType(type) }
}

function isKnownMessageType(type: string): type is OutboundMessageType {
  return MESSAGE_TYPES.some((known) => known === type)
}
