import { HttpClient } from './http'
import { asNumber, asString, pick } from './payload'
import { RateLimitedError, isRateLimited, withRetry } from './resilience'
import { CompletionRequest, CompletionResponse, GenerationProvider, ProviderHooks, ProviderMetadata } from './types'

export interface AnthropicConfig {
  baseUrl?: string
  defaultModel?: string
  maxTokens?: number
  maxRetries?: number
  timeoutMs?: number
}

const API_VERSION = '2023-06-01'

export class AnthropicProvider implements GenerationProvider {
  constructor(private readonly http: HttpClient, private readonly config: AnthropicConfig = {}) {}

  metadata(): ProviderMetadata {
    return {
      name: 'Anthropic',
      models: [this.config.defaultModel || 'claude-3-5-sonnet-20240620'],
      pricing: { inputPerMillion: 3, outputPerMillion: 15 },
    }
  }

  async complete(request: CompletionRequest, hooks?: ProviderHooks): Promise<CompletionResponse> {
    const payload = {
      model: request.model || this.config.defaultModel || 'claude-3-5-sonnet-20240620',
      max_tokens: this.config.maxTokens ?? 4096,
      system: request.systemPrompt,
      messages: [{ role: 'user', content: request.prompt }],
    }

    const perform = async (): Promise<CompletionResponse> => {
      const res = await this.http.request(
        {
          url: `${this.config.baseUrl || 'https://api.anthropic.com/v1'}/messages`,
          headers: { 'x-api-key': request.apiKey, 'anthropic-version': API_VERSION },
          body: payload,
          expectedStatus: [200, 429],
          timeoutMs: this.config.timeoutMs,
        },
        hooks,
      )

      if (res.status === 429) throw new RateLimitedError('Anthropic', res.headers['retry-after'])

      const apiError = asString(pick(res.data, 'error', 'message'))
      if (apiError) throw new Error(`anthropic api error: ${apiError}`)

      return {
        text: asString(pick(res.data, 'content', 0, 'text')),
        inputTokens: asNumber(pick(res.data, 'usage', 'input_tokens')),
        outputTokens: asNumber(pick(res.data, 'usage', 'output_tokens')),
        requestId: res.headers['request-id'] || request.requestId,
        raw: res.data,
      }
    }

    return withRetry(perform, { retries: this.config.maxRetries ?? 2, baseDelayMs: 400, maxDelayMs: 3000, shouldRetry: isRateLimited }, hooks)
  }
}

export function buildAnthropicFromEnv(http: HttpClient, env: NodeJS.ProcessEnv = process.env): AnthropicProvider {
  return new AnthropicProvider(http, {
    baseUrl: env.ANTHROPIC_BASE_URL,
    defaultModel: env.ANTHROPIC_MODEL,
  })
}
