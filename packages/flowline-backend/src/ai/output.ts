const ANSI_PATTERN = /\x1b\[[0-9;]*m/g

export function cleanOutput(output: string): string {
  return output.replace(ANSI_PATTERN, '')
}

/**
 * Returns the last balanced `{...}` block of the text, scanning back from the
 * final closing brace, or null when there is none.
 */
export function extractJson(output: string): string | null {
  const end = output.lastIndexOf('}')
  if (end === -1) return null
  let balance = 0
  for (let i = end; i >= 0; i--) {
    const char = output[i]
    if (char === '}') balance++
    else if (char === '{') balance--
    if (balance === 0) return output.slice(i, end + 1)
  }
  return null
}

/** Reads `Input Tokens: N` / `Output Tokens: N` markers some CLIs print. */
export function extractTokenCount(output: string): { inputTokens: number; outputTokens: number } {
  const input = /Input Tokens:\s*(\d+)/i.exec(output)
  const out = /Output Tokens:\s*(\d+)/i.exec(output)
  return {
    inputTokens: input ? Number.parseInt(input[1], 10) : 0,
    outputTokens: out ? Number.parseInt(out[1], 10) : 0,
  }
}
