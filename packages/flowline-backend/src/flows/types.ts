export type FlowNodeType = 'agent' | (string & {})

export interface FlowNodeData {
  label: string
  /** Agent role, e.g. "planner" or "coder". */
  role: string
  /** The task handed to the agent. */
  prompt: string
  /** Provider name as stored, e.g. "Anthropic". */
  provider: string
}

export interface FlowNode {
  id: string
  type: FlowNodeType
  data: FlowNodeData
}

export interface FlowEdge {
  id: string
  source: string
  target: string
}

export interface FlowGraph {
  nodes: FlowNode[]
  edges: FlowEdge[]
}

export interface FlowDefinition {
  id: number
  name: string
  /** Raw graph JSON as persisted; parsed only at execution time. */
  data: string
  status: string
  createdAt: string
}

export type FlowRunState = 'PENDING' | 'RUNNING' | 'COMPLETED' | 'FAILED'

export interface FlowStatus {
  flowId: number
  status: FlowRunState
  lastNode?: string
  updatedAt: string
  error?: string
}

export interface FlowRunSummary {
  flowId: number
  status: 'COMPLETED'
  executionTimeMs: number
  nodesExecuted: number
}
