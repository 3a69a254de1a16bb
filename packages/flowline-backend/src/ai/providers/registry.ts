import { GenerationProvider, ProviderMetadata } from './types'

/** Providers keyed by the exact name flows refer to them by ("Anthropic", "OpenAI"). */
export class ProviderRegistry {
  private readonly providers = new Map<string, GenerationProvider>()

  register(provider: GenerationProvider) {
    this.providers.set(provider.metadata().name, provider)
  }

  has(name: string): boolean {
    return this.providers.has(name)
  }

  get(name: string): GenerationProvider | undefined {
    return this.providers.get(name)
  }

  names(): string[] {
    return Array.from(this.providers.keys())
  }

  listMetadata(): ProviderMetadata[] {
    return Array.from(this.providers.values()).map((p) => p.metadata())
  }
}
