/**
 * Provider-neutral contracts for the generation backends. A provider only
 * knows how to send one system + user prompt pair and report token usage;
 * pricing and output post-processing live in the gateway.
 */
import { Logger } from '../../types'

export interface CompletionRequest {
  systemPrompt: string
  prompt: string
  apiKey: string
  model?: string
  requestId?: string
}

export interface CompletionResponse {
  text: string
  /** Zero when the provider reported no usage. */
  inputTokens: number
  outputTokens: number
  requestId?: string
  raw?: unknown
}

/** USD per one million tokens. */
export interface ProviderPricing {
  inputPerMillion: number
  outputPerMillion: number
}

export interface ProviderMetadata {
  name: string
  models: string[]
  pricing: ProviderPricing
}

export interface ProviderHooks {
  logger?: Logger
  /** Optional hook to fan out traces for observability tools. */
  onTrace?: (event: { name: string; meta?: Record<string, unknown> }) => void
}

export interface GenerationProvider {
  complete(request: CompletionRequest, hooks?: ProviderHooks): Promise<CompletionResponse>
  metadata(): ProviderMetadata
}
