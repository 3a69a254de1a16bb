/** Walks an untyped JSON body; any missing step yields undefined. */
export function pick(value: unknown, ...path: (string | number)[]): unknown {
  let current: unknown = value
  for (const key of path) {
    if (typeof current !== 'object' || current === null) return undefined
    current = Array.isArray(current) && typeof key === 'number' ? current[key] : Reflect.get(current, key)
  }
  return current
}

export function asNumber(value: unknown): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : 0
}

export function asString(value: unknown): string {
  return typeof value === 'string' ? value : ''
}
