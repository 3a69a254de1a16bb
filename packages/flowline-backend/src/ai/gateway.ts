import { GenerationError, UnsupportedProviderError, errorMessage } from '../errors'
import { Logger } from '../types'
import { cleanOutput, extractJson, extractTokenCount } from './output'
import { buildAnthropicFromEnv } from './providers/anthropic'
import { HttpClient } from './providers/http'
import { buildOpenAiFromEnv } from './providers/openai'
import { ProviderRegistry } from './providers/registry'
import { StubProvider } from './providers/stub'
import { CompletionResponse, ProviderPricing } from './providers/types'
import { resolveRole, systemPromptFor } from './roles'

export interface GenerationResult {
  text: string
  inputTokens: number
  outputTokens: number
  /** USD. */
  cost: number
}

/** What the engine needs from whatever turns a role + prompt into text. */
export interface GenerationService {
  supports(provider: string): boolean
  providers(): string[]
  execute(role: string, prompt: string, secret: string, provider: string): Promise<GenerationResult>
}

export function calculateCost(pricing: ProviderPricing, inputTokens: number, outputTokens: number): number {
  return (inputTokens * pricing.inputPerMillion) / 1_000_000 + (outputTokens * pricing.outputPerMillion) / 1_000_000
}

/**
 * Routes prompts to registered providers. Picks the system prompt from the
 * agent role, post-processes the text, falls back to token markers in the
 * text when the provider reports no usage, and prices the call.
 */
export class ProviderGateway implements GenerationService {
  constructor(private readonly registry: ProviderRegistry, private readonly logger?: Logger) {}

  supports(provider: string): boolean {
    return this.registry.has(provider)
  }

  providers(): string[] {
    return this.registry.names()
  }

  async execute(role: string, prompt: string, secret: string, providerName: string): Promise<GenerationResult> {
    const provider = this.registry.get(providerName)
    if (!provider) throw new UnsupportedProviderError(providerName)
    const agentRole = resolveRole(role)
    if (!agentRole) throw new GenerationError(`unknown agent role: ${role}`)

    let response: CompletionResponse
    try {
      response = await provider.complete({ systemPrompt: systemPromptFor(agentRole), prompt, apiKey: secret }, { logger: this.logger })
    } catch (err) {
      throw new GenerationError(`${providerName} request failed: ${errorMessage(err)}`, { cause: err })
    }

    const cleaned = cleanOutput(response.text)
    let { inputTokens, outputTokens } = response
    if (inputTokens === 0 && outputTokens === 0) {
      ;({ inputTokens, outputTokens } = extractTokenCount(cleaned))
    }
    const text = extractJson(cleaned) ?? cleaned
    const cost = calculateCost(provider.metadata().pricing, inputTokens, outputTokens)
    this.logger?.debug?.('[ai] completion', { provider: providerName, role: agentRole, inputTokens, outputTokens, cost })
    return { text, inputTokens, outputTokens, cost }
  }
}

export function buildProviderRegistry(http: HttpClient, opts: { enableStub?: boolean; env?: NodeJS.ProcessEnv } = {}) {
  const registry = new ProviderRegistry()
  registry.register(buildAnthropicFromEnv(http, opts.env))
  registry.register(buildOpenAiFromEnv(http, opts.env))
  if (opts.enableStub) registry.register(new StubProvider())
  return registry
}
