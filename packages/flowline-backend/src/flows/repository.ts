import { Pool } from 'pg'
import { NotFoundError } from '../errors'
import { FlowDefinition } from './types'

export type NewFlow = Pick<FlowDefinition, 'name' | 'data'> & { status?: string }

export interface FlowRepository {
  init?(): Promise<void>
  list(): Promise<FlowDefinition[]>
  get(flowId: number): Promise<FlowDefinition | null>
  create(flow: NewFlow): Promise<FlowDefinition>
  update(flow: Pick<FlowDefinition, 'id'> & NewFlow): Promise<FlowDefinition>
  /** Resolves `false` when no flow had that id. */
  delete(flowId: number): Promise<boolean>
}

export class MemoryFlowRepository implements FlowRepository {
  private flows = new Map<number, FlowDefinition>()
  private nextId = 1

  async list(): Promise<FlowDefinition[]> {
    return Array.from(this.flows.values()).sort((a, b) => b.id - a.id)
  }

  async get(flowId: number): Promise<FlowDefinition | null> {
    return this.flows.get(flowId) || null
  }

  async create(flow: NewFlow): Promise<FlowDefinition> {
    const created: FlowDefinition = {
      id: this.nextId++,
      name: flow.name,
      data: flow.data,
      status: flow.status || 'draft',
      createdAt: new Date().toISOString(),
    }
    this.flows.set(created.id, created)
    return created
  }

  async update(flow: Pick<FlowDefinition, 'id'> & NewFlow): Promise<FlowDefinition> {
    const existing = this.flows.get(flow.id)
    if (!existing) throw new NotFoundError(`flow ${flow.id} not found`)
    const next: FlowDefinition = { ...existing, name: flow.name, data: flow.data, status: flow.status ?? existing.status }
    this.flows.set(flow.id, next)
    return next
  }

  async delete(flowId: number): Promise<boolean> {
    return this.flows.delete(flowId)
  }
}

type FlowRow = {
  id: number | string
  name: string
  data: string
  status: string
  created_at: Date | string
}

export class PostgresFlowRepository implements FlowRepository {
  constructor(private pool: Pool) {}

  async init() {
    await this.pool.query(`
      create table if not exists flows (
        id serial primary key,
        name text not null,
        data text not null,
        status text not null default 'draft',
        created_at timestamptz not null default now()
      );
    `)
  }

  async list(): Promise<FlowDefinition[]> {
    const res = await this.pool.query<FlowRow>('select * from flows order by created_at desc')
    return res.rows.map(mapRowToFlow)
  }

  async get(flowId: number): Promise<FlowDefinition | null> {
    const res = await this.pool.query<FlowRow>('select * from flows where id = $1', [flowId])
    return res.rows[0] ? mapRowToFlow(res.rows[0]) : null
  }

  async create(flow: NewFlow): Promise<FlowDefinition> {
    const res = await this.pool.query<FlowRow>(
      'insert into flows (name, data, status) values ($1, $2, $3) returning *',
      [flow.name, flow.data, flow.status || 'draft'],
    )
    return mapRowToFlow(res.rows[0])
  }

  async update(flow: Pick<FlowDefinition, 'id'> & NewFlow): Promise<FlowDefinition> {
    const res = await this.pool.query<FlowRow>(
      'update flows set name = $2, data = $3, status = coalesce($4, status) where id = $1 returning *',
      [flow.id, flow.name, flow.data, flow.status ?? null],
    )
    if (res.rowCount === 0) throw new NotFoundError(`flow ${flow.id} not found`)
    return mapRowToFlow(res.rows[0])
  }

  async delete(flowId: number): Promise<boolean> {
    const res = await this.pool.query('delete from flows where id = $1', [flowId])
    return (res.rowCount ?? 0) > 0
  }
}

function mapRowToFlow(row: FlowRow): FlowDefinition {
  return {
    id: Number(row.id),
    name: row.name,
    data: row.data,
    status: row.status,
    createdAt: row.created_at instanceof Date ? row.created_at.toISOString() : row.created_at,
  }
}
