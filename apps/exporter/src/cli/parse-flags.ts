export type Flags = Record<string, string | boolean>

/** Short options mapped to their long names */
export const FLAG_ALIASES: Record<string, string> = {
  u: 'url',
  o: 'output',
  t: 'timeout',
  r: 'retries',
  d: 'delay',
  h: 'help',
}

/** Switches never consume the following token */
export const BOOLEAN_FLAGS: ReadonlySet<string> = new Set(['help', 'no-stats'])

function isFlagToken(token: string): boolean {
  return token.startsWith('--') || /^-[a-zA-Z]/.test(token)
}

/**
 * Parse `--key value`, `--key=value`, `-k value` and bare `--switch`
 * tokens. Positional tokens are ignored. Negative numbers are values,
 * not flags.
 */
export function parseFlags(argv: string[]): Flags {
  const flags: Flags = {}

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i]
    if (!isFlagToken(token)) {
      continue
    }

    const isShort = !token.startsWith('--')
    const body = isShort ? token.slice(1) : token.slice(2)
    const eq = body.indexOf('=')
    const rawKey = eq === -1 ? body : body.slice(0, eq)
    const key = isShort ? (FLAG_ALIASES[rawKey] ?? rawKey) : rawKey

    if (eq !== -1) {
      flags[key] = body.slice(eq + 1)
      continue
    }

    const next = argv[i + 1]
    if (next !== undefined && !isFlagToken(next) && !BOOLEAN_FLAGS.has(key)) {
      flags[key] = next
      i++
    } else {
      flags[key] = true
    }
  }

  return flags
}

export function asString(value: string | boolean | undefined): string | undefined {
  return typeof value === 'string' ? value : undefined
}
