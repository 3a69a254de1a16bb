import { HttpClient } from './http'
import { asNumber, asString, pick } from './payload'
import { RateLimitedError, isRateLimited, withRetry } from './resilience'
import { CompletionRequest, CompletionResponse, GenerationProvider, ProviderHooks, ProviderMetadata } from './types'

export interface OpenAiConfig {
  baseUrl?: string
  defaultModel?: string
  maxRetries?: number
  timeoutMs?: number
}

export class OpenAiProvider implements GenerationProvider {
  constructor(private readonly http: HttpClient, private readonly config: OpenAiConfig = {}) {}

  metadata(): ProviderMetadata {
    return {
      name: 'OpenAI',
      models: [this.config.defaultModel || 'gpt-4o'],
      pricing: { inputPerMillion: 5, outputPerMillion: 15 },
    }
  }

  private endpoint(path: string) {
    const base = this.config.baseUrl || 'https://api.openai.com/v1'
    return `${base}${path}`
  }

  async complete(request: CompletionRequest, hooks?: ProviderHooks): Promise<CompletionResponse> {
    const payload = {
      model: request.model || this.config.defaultModel || 'gpt-4o',
      messages: [
        { role: 'system', content: request.systemPrompt },
        { role: 'user', content: request.prompt },
      ],
    }

    const perform = async (): Promise<CompletionResponse> => {
      const res = await this.http.request(
        {
          url: this.endpoint('/chat/completions'),
          headers: { Authorization: `Bearer ${request.apiKey}` },
          body: payload,
          expectedStatus: [200, 201, 429],
          timeoutMs: this.config.timeoutMs,
        },
        hooks,
      )

      if (res.status === 429) throw new RateLimitedError('OpenAI', res.headers['retry-after'])

      return {
        text: asString(pick(res.data, 'choices', 0, 'message', 'content')),
        inputTokens: asNumber(pick(res.data, 'usage', 'prompt_tokens')),
        outputTokens: asNumber(pick(res.data, 'usage', 'completion_tokens')),
        requestId: res.headers['x-request-id'] || request.requestId,
        raw: res.data,
      }
    }

    return withRetry(perform, { retries: this.config.maxRetries ?? 2, baseDelayMs: 400, maxDelayMs: 3000, shouldRetry: isRateLimited }, hooks)
  }
}

export function buildOpenAiFromEnv(http: HttpClient, env: NodeJS.ProcessEnv = process.env): OpenAiProvider {
  return new OpenAiProvider(http, {
    baseUrl: env.OPENAI_BASE_URL,
    defaultModel: env.OPENAI_MODEL,
  })
}
