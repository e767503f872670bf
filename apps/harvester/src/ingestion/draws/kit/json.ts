export type SafeJsonParseResult =
  | { ok: true; value: unknown }
  | { ok: false; error: string }

/**
 * JSON.parse that reports instead of throwing. A leading BOM is ignored.
 */
export function safeJsonParse(input: string): SafeJsonParseResult {
  try {
    return { ok: true, value: JSON.parse(input.replace(/^\uFEFF/, '')) }
  } catch (error) {
    return {
      ok: false,
      error: error instanceof Error ? error.message : 'Invalid JSON',
    }
  }
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Walk a dot-separated key path (`content.list`). The empty path is the
 * value itself. Returns undefined as soon as a segment is missing.
 */
export function getPath(value: unknown, path: string): unknown {
  if (path === '') return value

  let current: unknown = value
  for (const segment of path.split('.')) {
    if (!isPlainObject(current)) return undefined
    current = current[segment]
  }
  return current
}
