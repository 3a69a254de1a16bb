import { CircuitBreaker } from './resilience'
import { ProviderHooks } from './types'

export interface HttpRequestOptions {
  url: string
  method?: string
  headers?: Record<string, string>
  body?: unknown
  /** Statuses handed back to the caller instead of raising `HttpError`. */
  expectedStatus?: number | number[]
  timeoutMs?: number
}

export interface HttpResponse {
  status: number
  headers: Record<string, string>
  /** Parsed JSON body, or undefined when the body was not JSON. */
  data: unknown
}

export class HttpError extends Error {
  constructor(readonly status: number, readonly data: unknown) {
    super(`Unexpected status ${status}`)
    this.name = 'HttpError'
  }
}

export interface HttpClient {
  request(options: HttpRequestOptions, hooks?: ProviderHooks): Promise<HttpResponse>
}

export const DEFAULT_HTTP_TIMEOUT_MS = 30_000

/**
 * fetch-backed client shared by the providers. Each request is bounded by a
 * timeout and passes through a circuit breaker; retries are left to callers.
 */
export class FetchHttpClient implements HttpClient {
  constructor(private breaker = new CircuitBreaker()) {}

  async request(options: HttpRequestOptions, hooks?: ProviderHooks): Promise<HttpResponse> {
    const { url, method = 'POST', headers = {}, body, expectedStatus = [200], timeoutMs = DEFAULT_HTTP_TIMEOUT_MS } = options

    const exec = async (): Promise<HttpResponse> => {
      const res = await fetch(url, {
        method,
        headers: { 'content-type': 'application/json', ...headers },
        body: body !== undefined ? JSON.stringify(body) : undefined,
        signal: AbortSignal.timeout(timeoutMs),
      })
      const data: unknown = await res.json().catch(() => undefined)
      const okStatuses = Array.isArray(expectedStatus) ? expectedStatus : [expectedStatus]
      if (!okStatuses.includes(res.status)) throw new HttpError(res.status, data)
      return { status: res.status, headers: Object.fromEntries(res.headers.entries()), data }
    }

    return this.breaker.exec(
      () =>
        exec().catch((err: unknown) => {
          hooks?.logger?.error('[http] request failed', { url, error: err instanceof Error ? err.message : String(err) })
          throw err
        }),
      hooks,
    )
  }
}
