/** Resolves the API secret for a provider; `null` means none is stored. */
export interface CredentialStore {
  get(provider: string): Promise<string | null>
}

export function credentialEnvKey(provider: string) {
  const slug = provider.trim().toUpperCase().replace(/[^A-Z0-9]+/g, '_').replace(/^_+|_+$/g, '')
  return `${slug}_API_KEY`
}

/** Reads `<PROVIDER>_API_KEY`, e.g. `ANTHROPIC_API_KEY` for "Anthropic". */
export class EnvCredentialStore implements CredentialStore {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  async get(provider: string): Promise<string | null> {
    const value = this.env[credentialEnvKey(provider)]
    return value && value.trim() ? value.trim() : null
  }
}

export class MemoryCredentialStore implements CredentialStore {
  private readonly secrets = new Map<string, string>()

  constructor(initial: Record<string, string> = {}) {
    for (const [provider, secret] of Object.entries(initial)) this.set(provider, secret)
  }

  set(provider: string, secret: string) {
    this.secrets.set(provider, secret)
  }

  delete(provider: string) {
    this.secrets.delete(provider)
  }

  async get(provider: string): Promise<string | null> {
    return this.secrets.get(provider) ?? null
  }
}
