import Ajv, { ErrorObject, ValidateFunction } from 'ajv'
import addFormats from 'ajv-formats'
import { FlowStatus } from './flows/types'

const ajv = new Ajv({ allErrors: true, strict: false })
addFormats(ajv)

export type StoredNodeData = Partial<Record<'label' | 'role' | 'prompt' | 'provider', string>>

/** Graph document as persisted in a flow's `data` column. */
export interface StoredGraph {
  nodes?: { id: string; type: string; data?: StoredNodeData | null }[] | null
  edges?: { id?: string; source?: string; target?: string }[] | null
}

export interface FlowBody {
  name: string
  data?: string | Record<string, unknown> | null
  status?: string
}

const nodeDataSchema = {
  type: ['object', 'null'],
  properties: {
    label: { type: 'string' },
    role: { type: 'string' },
    prompt: { type: 'string' },
    provider: { type: 'string' },
  },
}

export const flowGraphSchema = {
  type: 'object',
  properties: {
    nodes: {
      type: ['array', 'null'],
      items: {
        type: 'object',
        required: ['id', 'type'],
        properties: {
          id: { type: 'string' },
          type: { type: 'string' },
          data: nodeDataSchema,
        },
      },
    },
    edges: {
      type: ['array', 'null'],
      items: {
        type: 'object',
        properties: {
          id: { type: 'string' },
          source: { type: 'string' },
          target: { type: 'string' },
        },
      },
    },
  },
}

export const flowStatusSchema = {
  type: 'object',
  required: ['flowId', 'status', 'updatedAt'],
  properties: {
    flowId: { type: 'integer' },
    status: { enum: ['PENDING', 'RUNNING', 'COMPLETED', 'FAILED'] },
    lastNode: { type: 'string' },
    updatedAt: { type: 'string', format: 'date-time' },
    error: { type: 'string' },
  },
}

export const flowBodySchema = {
  type: 'object',
  required: ['name'],
  properties: {
    name: { type: 'string', pattern: '\\S' },
    data: { type: ['string', 'object', 'null'] },
    status: { type: 'string' },
  },
}

export const validateFlowGraph: ValidateFunction<StoredGraph> = ajv.compile<StoredGraph>(flowGraphSchema)
export const validateFlowStatus: ValidateFunction<FlowStatus> = ajv.compile<FlowStatus>(flowStatusSchema)
export const validateFlowBody: ValidateFunction<FlowBody> = ajv.compile<FlowBody>(flowBodySchema)

/** Joins validator errors as `path: message`; `root` names the document when the path is empty. */
export function describeErrors(errors: ErrorObject[] | null | undefined, root: string): string {
  return (errors || []).map((e) => `${e.instancePath || root}: ${e.message}`).join('; ')
}
