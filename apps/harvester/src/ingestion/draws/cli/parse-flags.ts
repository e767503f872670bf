export type Flags = Record<string, string | boolean>

/**
 * `--key value`, `--key=value` and bare `--switch`. Consecutive non-flag
 * tokens after a key are joined with a space; leading positionals are
 * ignored.
 */
export function parseFlags(argv: string[]): Flags {
  const flags: Flags = {}

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i]
    if (!token.startsWith('--')) {
      continue
    }

    const body = token.slice(2)
    const eq = body.indexOf('=')
    if (eq > 0) {
      flags[body.slice(0, eq)] = body.slice(eq + 1)
      continue
    }

    const valueTokens: string[] = []
    let j = i + 1
    while (j < argv.length && !argv[j].startsWith('--')) {
      valueTokens.push(argv[j])
      j++
    }

    if (valueTokens.length > 0) {
      flags[body] = valueTokens.join(' ')
      i = j - 1
    } else {
      flags[body] = true
    }
  }

  return flags
}

export function asString(value: string | boolean | undefined): string | undefined {
  return typeof value === 'string' ? value : undefined
}
