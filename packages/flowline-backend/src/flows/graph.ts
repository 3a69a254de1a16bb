import { NotFoundError, ParseError, errorMessage } from '../errors'
import { describeErrors, validateFlowGraph } from '../validation'
import { FlowRepository } from './repository'
import { FlowGraph } from './types'

/**
 * Parses the stored graph text of a flow. Node order is kept exactly as
 * stored: it is the execution order. Edges are parsed for callers that render
 * the graph but are not consulted when scheduling.
 */
export function parseFlowGraph(raw: string): FlowGraph {
  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch (err) {
    throw new ParseError(`failed to parse flow data: ${errorMessage(err)}`, { cause: err })
  }
  if (!validateFlowGraph(parsed)) {
    throw new ParseError(`failed to parse flow data: ${describeErrors(validateFlowGraph.errors, 'graph')}`)
  }
  return {
    nodes: (parsed.nodes || []).map(({ id, type, data }) => ({
      id,
      type,
      data: {
        label: data?.label ?? '',
        role: data?.role ?? '',
        prompt: data?.prompt ?? '',
        provider: data?.provider ?? '',
      },
    })),
    edges: (parsed.edges || []).map((edge) => ({
      id: edge.id ?? '',
      source: edge.source ?? '',
      target: edge.target ?? '',
    })),
  }
}

export async function loadFlowGraph(repository: FlowRepository, flowId: number): Promise<FlowGraph> {
  const flow = await repository.get(flowId)
  if (!flow) throw new NotFoundError(`flow ${flowId} not found`)
  return parseFlowGraph(flow.data)
}
