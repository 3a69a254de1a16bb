import { CompletionRequest, CompletionResponse, GenerationProvider, ProviderMetadata } from './types'

/**
 * Deterministic provider for development without API keys. Returns a fixed
 * JSON document and reports no usage, so it never costs anything.
 */
export class StubProvider implements GenerationProvider {
  metadata(): ProviderMetadata {
    return { name: 'Stub', models: ['stub-model-v1'], pricing: { inputPerMillion: 0, outputPerMillion: 0 } }
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const text = JSON.stringify({
      status: 'success',
      message: 'This is a stub response for testing purposes.',
      data: { generated: true, model: 'stub-model-v1', promptLength: request.prompt.length },
    })
    return { text, inputTokens: 0, outputTokens: 0, requestId: request.requestId }
  }
}
