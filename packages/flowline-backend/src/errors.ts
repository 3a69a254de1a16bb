/**
 * Error taxonomy for flow execution. Every error carries a stable snake_case
 * code (used as the `error` field of API responses) and an HTTP status hint.
 */
export class FlowlineError extends Error {
  constructor(
    message: string,
    readonly code: string,
    readonly status = 500,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = new.target.name
  }
}

export class NotFoundError extends FlowlineError {
  constructor(message: string) {
    super(message, 'not_found', 404)
  }
}

export class ParseError extends FlowlineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'parse_error', 422, options)
  }
}

export class MissingCredentialError extends FlowlineError {
  constructor(readonly provider: string, options?: { cause?: unknown }) {
    super(`missing API key for provider ${provider}`, 'missing_credential', 412, options)
  }
}

export class UnsupportedProviderError extends FlowlineError {
  constructor(readonly provider: string) {
    super(`unsupported provider: ${provider}`, 'unsupported_provider', 400)
  }
}

export class GenerationError extends FlowlineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'generation_failed', 502, options)
  }
}

/** Non-fatal: the engine logs it and carries on. */
export class LedgerWriteError extends FlowlineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'ledger_write_failed', 500, options)
  }
}

/** Non-fatal for a run; raised by a signaler that could not persist or read a status. */
export class SignalDeliveryError extends FlowlineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'signal_delivery_failed', 500, options)
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message
  return String(err)
}
