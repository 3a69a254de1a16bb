import crypto from 'crypto'
import jwt from 'jsonwebtoken'
import { errorMessage } from './errors'
import { Logger, RequestLike } from './types'

export interface AccessClaims {
  sub?: string
  role?: string
  jti?: string
}

export interface AuthIssueResult {
  token: string
  expiresAt: number
  jti: string
}

export interface AuthServiceConfig {
  accessSecret: string
  accessTtlMs?: number
  issuer?: string
  audience?: string
  onRevoke?: (jti: string) => void
  logger?: Logger
}

export type VerifyResult = { ok: true; claims: AccessClaims } | { ok: false; error: string }

function epochMs(expSeconds: number | undefined) {
  if (!expSeconds) return Date.now()
  return expSeconds * 1000
}

export class AuthService {
  private readonly revoked = new Set<string>()

  constructor(private readonly config: AuthServiceConfig) {}

  issueAccessToken(claims: AccessClaims): AuthIssueResult {
    const jti = claims.jti || crypto.randomUUID()
    const options: jwt.SignOptions = {
      expiresIn: Math.max(60, Math.floor((this.config.accessTtlMs || 15 * 60 * 1000) / 1000)),
    }
    if (this.config.issuer) options.issuer = this.config.issuer
    if (this.config.audience) options.audience = this.config.audience
    const token = jwt.sign({ ...claims, jti }, this.config.accessSecret, options)
    const decoded = jwt.decode(token)
    const exp = decoded !== null && typeof decoded === 'object' ? decoded.exp : undefined
    return { token, jti, expiresAt: epochMs(exp) }
  }

  verifyAccess(token: string): VerifyResult {
    try {
      const decoded = jwt.verify(token, this.config.accessSecret, {
        issuer: this.config.issuer,
        audience: this.config.audience,
      })
      if (typeof decoded === 'string') return { ok: false, error: 'invalid_token' }
      if (decoded.jti && this.revoked.has(decoded.jti)) return { ok: false, error: 'revoked' }
      const role = decoded.role
      return {
        ok: true,
        claims: { sub: decoded.sub, jti: decoded.jti, role: typeof role === 'string' ? role : undefined },
      }
    } catch (err) {
      this.config.logger?.debug?.('[auth] token rejected', errorMessage(err))
      return { ok: false, error: errorMessage(err) || 'invalid_token' }
    }
  }

  revoke(jti: string) {
    this.revoked.add(jti)
    this.config.onRevoke?.(jti)
  }
}

export function bearerToken(req: Pick<RequestLike, 'headers'>): string | null {
  const header = req.headers['authorization']
  if (!header || !header.startsWith('Bearer ')) return null
  return header.slice('Bearer '.length).trim() || null
}

/**
 * Builds the request guard for `/api/` routes. With neither a static token nor
 * a JWT secret configured every request passes.
 */
export function buildAuthenticator(opts: { bearerToken?: string; auth?: AuthService }) {
  return (req: Pick<RequestLike, 'headers'>): boolean => {
    if (!opts.bearerToken && !opts.auth) return true
    const token = bearerToken(req)
    if (!token) return false
    if (opts.bearerToken && token === opts.bearerToken) return true
    return opts.auth ? opts.auth.verifyAccess(token).ok : false
  }
}
