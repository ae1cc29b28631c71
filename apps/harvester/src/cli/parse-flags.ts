export type Flags = Record<string, string | boolean>

/**
 * --key value pairs; a flag with no value is true. Consecutive non-flag
 * tokens after a key join into one value. Tokens before the first flag are
 * ignored.
 */
export function parseFlags(argv: readonly string[]): Flags {
  const flags: Flags = {}

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i]
    if (!token.startsWith('--')) {
      continue
    }

    const key = token.slice(2)
    const valueTokens: string[] = []
    let j = i + 1
    while (j < argv.length && !argv[j].startsWith('--')) {
      valueTokens.push(argv[j])
      j++
    }

    if (valueTokens.length > 0) {
      flags[key] = valueTokens.join(' ')
      i = j - 1
    } else {
      flags[key] = true
    }
  }

  return flags
}

export function asString(value: string | boolean | undefined): string | undefined {
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined
}

/** Positive integers only; anything else is undefined. */
export function asPositiveInt(value: string | boolean | undefined): number | undefined {
  if (typeof value !== 'string' || !/^\d+$/.test(value.trim())) {
    return undefined
  }
  const parsed = Number.parseInt(value, 10)
  return parsed > 0 ? parsed : undefined
}

/** "1,2, 3" → [1, 2, 3]; undefined when any entry is not a positive integer. */
export function asIdList(value: string | boolean | undefined): number[] | undefined {
  if (typeof value !== 'string') {
    return undefined
  }
  const ids = value
    .split(/[,\s]+/)
    .filter((part) => part !== '')
    .map((part) => asPositiveInt(part))

  if (ids.length === 0) return undefined
  const valid = ids.filter((id): id is number => id !== undefined)
  return valid.length === ids.length ? valid : undefined
}
