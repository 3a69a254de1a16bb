import { describe, expect, it } from 'vitest'
import { NotFoundError, ParseError } from '../src/errors'
import { loadFlowGraph, parseFlowGraph } from '../src/flows/graph'
import { MemoryFlowRepository } from '../src/flows/repository'

describe('parseFlowGraph', () => {
  it('keeps nodes in stored order and fills absent data fields', () => {
    const parsed = parseFlowGraph(
      JSON.stringify({
        nodes: [
          { id: 'b', type: 'agent', data: { label: 'Second', role: 'coder', prompt: 'write it', provider: 'OpenAI' } },
          { id: 'a', type: 'input' },
        ],
        edges: [{ id: 'e1', source: 'a', target: 'b' }],
      }),
    )
    expect(parsed.nodes).toEqual([
      { id: 'b', type: 'agent', data: { label: 'Second', role: 'coder', prompt: 'write it', provider: 'OpenAI' } },
      { id: 'a', type: 'input', data: { label: '', role: '', prompt: '', provider: '' } },
    ])
    expect(parsed.edges).toEqual([{ id: 'e1', source: 'a', target: 'b' }])
  })

  it('treats missing or null node and edge lists as empty', () => {
    expect(parseFlowGraph('{}')).toEqual({ nodes: [], edges: [] })
    expect(parseFlowGraph('{"nodes": null, "edges": null}')).toEqual({ nodes: [], edges: [] })
  })

  it('rejects text that is not JSON', () => {
    expect(() => parseFlowGraph('not json')).toThrow(ParseError)
    expect(() => parseFlowGraph('not json')).toThrow(/^failed to parse flow data: /)
  })

  it('rejects a root that is not an object', () => {
    expect(() => parseFlowGraph('[1, 2]')).toThrow('failed to parse flow data: graph: must be object')
  })

  it('rejects a nodes field that is not an array', () => {
    expect(() => parseFlowGraph('{"nodes": {}}')).toThrow('failed to parse flow data: /nodes: must be array,null')
  })

  it('rejects nodes without string id and type', () => {
    const raw = JSON.stringify({ nodes: [{ id: 'a', type: 'agent' }, { id: 7, type: 'agent' }] })
    expect(() => parseFlowGraph(raw)).toThrow('failed to parse flow data: /nodes/1/id: must be string')
  })

  it('rejects edges that are not objects', () => {
    expect(() => parseFlowGraph('{"edges": ["a->b"]}')).toThrow('failed to parse flow data: /edges/0: must be object')
  })

  it('rejects nodes missing a type', () => {
    expect(() => parseFlowGraph('{"nodes": [{"id": "a"}]}')).toThrow(
      "failed to parse flow data: /nodes/0: must have required property 'type'",
    )
  })

  it('rejects node data fields that are not strings', () => {
    const raw = JSON.stringify({ nodes: [{ id: 'a', type: 'agent', data: { prompt: 42 } }] })
    expect(() => parseFlowGraph(raw)).toThrow('failed to parse flow data: /nodes/0/data/prompt: must be string')
  })
})

describe('loadFlowGraph', () => {
  it('reads and parses the stored graph', async () => {
    const repo = new MemoryFlowRepository()
    const flow = await repo.create({ name: 'one', data: '{"nodes":[{"id":"n1","type":"agent"}]}' })
    const loaded = await loadFlowGraph(repo, flow.id)
    expect(loaded.nodes.map((n) => n.id)).toEqual(['n1'])
  })

  it('throws NotFoundError for an unknown flow', async () => {
    const repo = new MemoryFlowRepository()
    await expect(loadFlowGraph(repo, 42)).rejects.toBeInstanceOf(NotFoundError)
    await expect(loadFlowGraph(repo, 42)).rejects.toThrow('flow 42 not found')
  })
})
