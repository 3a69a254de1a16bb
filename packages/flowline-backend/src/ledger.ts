import { createHash } from 'crypto'
import { Pool } from 'pg'
import { v4 as uuidv4 } from 'uuid'

export type LedgerStatus = 'SUCCESS' | 'FAILED'

export interface LedgerEntry {
  id: string
  timestamp: string
  flowId: number
  provider: string
  role: string
  /** SHA-256 of the prompt; prompts themselves are never stored. */
  promptHash: string
  inputTokens: number
  outputTokens: number
  cost: number
  latencyMs: number
  status: LedgerStatus
  errorMessage?: string
}

export type NewLedgerEntry = Omit<LedgerEntry, 'id' | 'timestamp'>

export interface LedgerFilter {
  flowId?: number
  limit?: number
}

/** Append-only record of every generation attempt. */
export interface Ledger {
  init?(): Promise<void>
  append(entry: NewLedgerEntry): Promise<LedgerEntry>
  list(filter?: LedgerFilter): Promise<LedgerEntry[]>
}

export function hashPrompt(prompt: string) {
  return createHash('sha256').update(prompt).digest('hex')
}

export class MemoryLedger implements Ledger {
  private entries: LedgerEntry[] = []

  async append(entry: NewLedgerEntry): Promise<LedgerEntry> {
    const rec: LedgerEntry = Object.freeze({ ...entry, id: uuidv4(), timestamp: new Date().toISOString() })
    this.entries.push(rec)
    return rec
  }

  async list(filter: LedgerFilter = {}): Promise<LedgerEntry[]> {
    const rows = filter.flowId === undefined ? this.entries : this.entries.filter((e) => e.flowId === filter.flowId)
    const newestFirst = [...rows].reverse()
    return filter.limit ? newestFirst.slice(0, filter.limit) : newestFirst
  }
}

type LedgerRow = {
  id: string
  timestamp: Date | string
  flow_id: string
  model_used: string
  agent_role: string
  prompt_hash: string
  input_tokens: number
  output_tokens: number
  total_cost_usd: number | string
  latency_ms: number
  status: LedgerStatus
  error_message: string | null
}

export class PostgresLedger implements Ledger {
  constructor(private pool: Pool) {}

  async init() {
    await this.pool.query(`
      create table if not exists token_ledger (
        id text primary key,
        timestamp timestamptz not null default now(),
        flow_id text not null,
        model_used text not null,
        agent_role text not null,
        prompt_hash text not null,
        input_tokens integer not null,
        output_tokens integer not null,
        total_cost_usd double precision not null,
        latency_ms integer not null,
        status text not null check (status in ('SUCCESS','FAILED')),
        error_message text
      );
      create index if not exists idx_ledger_flow_id on token_ledger(flow_id);
    `)
  }

  async append(entry: NewLedgerEntry): Promise<LedgerEntry> {
    const res = await this.pool.query<LedgerRow>(
      `insert into token_ledger (
        id, flow_id, model_used, agent_role, prompt_hash,
        input_tokens, output_tokens, total_cost_usd, latency_ms, status, error_message
      ) values ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10,$11) returning *`,
      [
        uuidv4(),
        String(entry.flowId),
        entry.provider,
        entry.role,
        entry.promptHash,
        entry.inputTokens,
        entry.outputTokens,
        entry.cost,
        entry.latencyMs,
        entry.status,
        entry.errorMessage ?? null,
      ],
    )
    return mapRowToEntry(res.rows[0])
  }

  async list(filter: LedgerFilter = {}): Promise<LedgerEntry[]> {
    const res = await this.pool.query<LedgerRow>(
      'select * from token_ledger where ($1::text is null or flow_id = $1) order by timestamp desc limit $2',
      [filter.flowId === undefined ? null : String(filter.flowId), filter.limit ?? 500],
    )
    return res.rows.map(mapRowToEntry)
  }
}

function mapRowToEntry(row: LedgerRow): LedgerEntry {
  const entry: LedgerEntry = {
    id: row.id,
    timestamp: row.timestamp instanceof Date ? row.timestamp.toISOString() : row.timestamp,
    flowId: Number(row.flow_id),
    provider: row.model_used,
    role: row.agent_role,
    promptHash: row.prompt_hash,
    inputTokens: Number(row.input_tokens),
    outputTokens: Number(row.output_tokens),
    cost: Number(row.total_cost_usd),
    latencyMs: Number(row.latency_ms),
    status: row.status,
  }
  if (row.error_message) entry.errorMessage = row.error_message
  return entry
}
